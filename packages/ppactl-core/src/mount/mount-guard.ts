import { runCommand, type CommandRunner } from '../utils/runCommand';
import { exists } from '../utils/fs';
import { logger } from '../utils/logger';
import { MountError, PermissionError, errorMessage } from '../errors';
import type { Privilege } from './privilege';

export interface MountGuardOptions {
  sentinelPath: string;
  mountPoint?: string;
}

export type ReleaseOutcome =
  | { state: 'remounted-ro' }
  | { state: 'kept-writable'; sentinelPath: string }
  | { state: 'failed'; warning: string };

/**
 * Toggles the root filesystem read-write for the duration of a mutating
 * operation. Prefer `withWritableRoot` over calling acquire/release directly.
 */
export class MountGuard {
  private readonly mountPoint: string;

  constructor(
    private readonly privilege: Privilege,
    private readonly opts: MountGuardOptions,
    private readonly run: CommandRunner = runCommand,
  ) {
    this.mountPoint = opts.mountPoint ?? '/';
  }

  async acquire(): Promise<void> {
    if (!this.privilege.root) {
      throw new PermissionError();
    }

    logger.debug('remounting read-write', { mountPoint: this.mountPoint });
    try {
      await this.run(`mount -o remount,rw ${this.mountPoint}`, { stdio: 'pipe' });
    } catch (e) {
      throw new MountError(`failed to remount ${this.mountPoint} read-write: ${errorMessage(e)}`);
    }
  }

  /** Never throws: a failed read-only remount is reported as a warning. */
  async release(): Promise<ReleaseOutcome> {
    try {
      await this.run('sync', { stdio: 'pipe' });
    } catch (e) {
      logger.warn('sync failed, remounting anyway', { error: errorMessage(e) });
    }

    if (await exists(this.opts.sentinelPath)) {
      logger.debug('sentinel present, leaving filesystem writable', { sentinelPath: this.opts.sentinelPath });
      return { state: 'kept-writable', sentinelPath: this.opts.sentinelPath };
    }

    try {
      logger.debug('remounting read-only', { mountPoint: this.mountPoint });
      await this.run(`mount -o remount,ro ${this.mountPoint}`, { stdio: 'pipe' });
      return { state: 'remounted-ro' };
    } catch (e) {
      const warning = `failed to remount ${this.mountPoint} read-only (${errorMessage(e)}); reboot the device to restore it`;
      logger.warn(warning);
      return { state: 'failed', warning };
    }
  }
}

export interface Guarded<T> {
  value: T;
  release: ReleaseOutcome;
}

/**
 * Runs `fn` with the root filesystem writable. Release is attempted on every
 * exit path once acquire has succeeded.
 */
export async function withWritableRoot<T>(guard: MountGuard, fn: () => Promise<T>): Promise<Guarded<T>> {
  await guard.acquire();

  let value: T;
  try {
    value = await fn();
  } catch (e) {
    await guard.release();
    throw e;
  }
  return { value, release: await guard.release() };
}
