import type { StepResult } from '../apt/package-manager';
import { withWritableRoot, type ReleaseOutcome } from '../mount/mount-guard';
import { logger } from '../utils/logger';
import { NotFoundError } from '../errors';
import type { PpaContext } from './context';
import { refreshAndUpgrade } from './upgrade';

export interface RemoveOptions {
  repo: string;
}

export interface RemoveResult {
  ok: boolean;
  repository: string;
  steps: StepResult[];
  release: ReleaseOutcome;
}

export async function remove(ctx: PpaContext, opts: RemoveOptions): Promise<RemoveResult> {
  if (!(await ctx.repositories.exists(opts.repo))) {
    throw new NotFoundError(`repository ${opts.repo} is not installed`);
  }

  logger.info('removing repository', { repository: opts.repo });

  const { value: steps, release } = await withWritableRoot(ctx.guard, async () => {
    await ctx.repositories.remove(opts.repo);
    return refreshAndUpgrade(ctx.packages);
  });

  return { ok: steps.every(s => s.ok), repository: opts.repo, steps, release };
}
