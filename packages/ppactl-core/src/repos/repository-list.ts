import { join } from 'node:path';
import { minimatch } from 'minimatch';
import { repositoryNameSchema, type PpaConfig } from '@ppactl/contracts';
import type { HttpClient } from '../utils/http';
import { exists, listDir, removeFile, writeText } from '../utils/fs';
import { logger } from '../utils/logger';
import { NotFoundError, ValidationError, errorMessage } from '../errors';

export type RepositoryListConfig = Pick<
  PpaConfig,
  'distributionUrl' | 'component' | 'listDir' | 'listPrefix' | 'listSuffix' | 'preferencesDir' | 'pinPriority'
>;

/**
 * Enabled repositories, one apt source list file each. A repository is
 * enabled iff its list file exists.
 */
export class RepositoryList {
  private readonly distributionUrl: string;

  constructor(
    private readonly config: RepositoryListConfig,
    private readonly http: HttpClient,
  ) {
    this.distributionUrl = config.distributionUrl.endsWith('/')
      ? config.distributionUrl
      : `${config.distributionUrl}/`;
  }

  listPath(name: string): string {
    return join(this.config.listDir, `${this.config.listPrefix}${name}${this.config.listSuffix}`);
  }

  pinPath(name: string): string {
    return join(this.config.preferencesDir, `${this.config.listPrefix}${name}.pref`);
  }

  async exists(name: string): Promise<boolean> {
    return exists(this.listPath(assertRepositoryName(name)));
  }

  /**
   * Enables `name` after checking the distribution point publishes it.
   * Returns false when it was already enabled.
   */
  async add(name: string): Promise<boolean> {
    if (await this.exists(name)) {
      logger.debug('repository already enabled', { name });
      return false;
    }

    await this.checkRemote(name);

    const listFile = this.listPath(name);
    await writeText(listFile, `deb ${this.distributionUrl} ${name} ${this.config.component}\n`);
    if (this.config.pinPriority > 0) {
      await writeText(this.pinPath(name), this.pinEntry(name));
    }
    logger.info('repository enabled', { name, listFile });
    return true;
  }

  /** Returns false when `name` was not enabled. */
  async remove(name: string): Promise<boolean> {
    if (!(await this.exists(name))) {
      return false;
    }

    await removeFile(this.listPath(name));
    await removeFile(this.pinPath(name));
    logger.info('repository disabled', { name });
    return true;
  }

  async listAll(): Promise<string[]> {
    const { listPrefix, listSuffix } = this.config;
    const pattern = `${listPrefix}*${listSuffix}`;

    return (await listDir(this.config.listDir))
      .filter(file => minimatch(file, pattern, { dot: true }))
      .map(file => file.slice(listPrefix.length, file.length - listSuffix.length))
      .filter(name => name.length > 0)
      .sort();
  }

  private async checkRemote(name: string) {
    const url = new URL(`dists/${encodeURIComponent(name)}/`, this.distributionUrl).toString();

    let status: number;
    try {
      status = (await this.http.request({ url, method: 'GET' })).status;
    } catch (e) {
      logger.debug('distribution check failed', { url, err: errorMessage(e) });
      throw new NotFoundError(`repository ${name} not found: ${errorMessage(e)}`);
    }

    if (status !== 200) {
      throw new NotFoundError(`repository ${name} not found at ${this.distributionUrl} (HTTP ${status})`);
    }
  }

  private pinEntry(name: string): string {
    return [
      'Package: *',
      `Pin: release a=${name}`,
      `Pin-Priority: ${this.config.pinPriority}`,
      '',
    ].join('\n');
  }
}

export function assertRepositoryName(name: string): string {
  const result = repositoryNameSchema.safeParse(name);
  if (!result.success) {
    throw new ValidationError(`invalid repository name: ${JSON.stringify(name)}`);
  }
  return result.data;
}
