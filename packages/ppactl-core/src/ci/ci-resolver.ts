import type { ZodType, ZodTypeDef } from 'zod';
import {
  BuildStatus,
  ciBuildSchema,
  pullRequestSchema,
  type CiBuildPayload,
  type PpaConfig,
} from '@ppactl/contracts';
import type { HttpClient } from '../utils/http';
import { logger } from '../utils/logger';
import { formatIssues } from '../utils/zod';
import { NotFoundError, ValidationError, errorMessage } from '../errors';

export type CiResolverConfig = Pick<PpaConfig, 'githubApiUrl' | 'ciUrl' | 'owner'>;

export interface ProjectRef {
  owner: string;
  name: string;
}

const SEGMENT = /^[A-Za-z0-9._-]+$/;

/** Accepts `name` or `owner/name`; a bare name uses the configured owner. */
export function parseProject(project: string, defaultOwner: string): ProjectRef {
  const [first, second, ...rest] = project.split('/');
  const ref = second === undefined
    ? { owner: defaultOwner, name: first ?? '' }
    : { owner: first ?? '', name: second };

  if (rest.length > 0 || !SEGMENT.test(ref.owner) || !SEGMENT.test(ref.name)) {
    throw new ValidationError(`invalid project: ${JSON.stringify(project)}`);
  }
  return ref;
}

/**
 * Collapses a CI run to a build status. Only an explicit success passes;
 * an in-progress run is Building; everything else is Failed.
 */
export function toBuildStatus(run: CiBuildPayload | undefined): BuildStatus {
  if (!run) { return BuildStatus.Failed; }
  if (run.building === true) { return BuildStatus.Building; }

  switch (run.result) {
    case 'SUCCESS':
      return BuildStatus.Success;
    case 'BUILDING':
      return BuildStatus.Building;
    default:
      return BuildStatus.Failed;
  }
}

/**
 * Pull request → head branch → latest CI result. Two sequential lookups,
 * no retry and no caching.
 */
export class CiResolver {
  constructor(
    private readonly config: CiResolverConfig,
    private readonly http: HttpClient,
  ) {}

  async resolveBranch(project: string, prNumber: number): Promise<string> {
    const { owner, name } = parseProject(project, this.config.owner);
    const url = `${trimSlash(this.config.githubApiUrl)}/repos/${owner}/${name}/pulls/${prNumber}`;
    const label = `pull request ${owner}/${name}#${prNumber}`;

    const pr = await this.getJson(url, label, pullRequestSchema, {
      Accept: 'application/vnd.github+json',
    });
    logger.debug('pull request resolved', { project: `${owner}/${name}`, prNumber, branch: pr.head.ref });
    return pr.head.ref;
  }

  async resolveBuildStatus(project: string, branch: string): Promise<BuildStatus> {
    const { owner, name } = parseProject(project, this.config.owner);
    // multibranch job names are the URL-encoded branch, so the path segment is encoded twice
    const job = encodeURIComponent(encodeURIComponent(branch));
    const url = `${trimSlash(this.config.ciUrl)}/job/${owner}/job/${name}/job/${job}/lastBuild/api/json`;

    const run = await this.getJson(url, `CI build for ${owner}/${name}@${branch}`, ciBuildSchema);
    const status = toBuildStatus(run);
    logger.debug('build status resolved', { branch, result: run.result, building: run.building, status });
    return status;
  }

  private async getJson<T>(
    url: string,
    label: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    headers?: Record<string, string>,
  ): Promise<T> {
    let body: string;
    try {
      const resp = await this.http.request({ url, method: 'GET', headers });
      if (resp.status !== 200) {
        throw new NotFoundError(`${label} not found (HTTP ${resp.status})`);
      }
      body = resp.body;
    } catch (e) {
      if (e instanceof NotFoundError) { throw e; }
      throw new NotFoundError(`${label} not found: ${errorMessage(e)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (e) {
      throw new NotFoundError(`${label} not found: malformed response (${errorMessage(e)})`);
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new NotFoundError(`${label} not found: unexpected response (${formatIssues(result.error)})`);
    }
    return result.data;
  }
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
