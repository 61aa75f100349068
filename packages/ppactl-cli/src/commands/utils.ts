import type { ZodType, ZodTypeDef } from 'zod';
import { formatIssues, UsageError, type ReleaseOutcome, type StepResult } from '@ppactl/core';
import type { CommandContext } from './types';

export function parseCommandArgs<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  raw: unknown,
  command: string,
): T {
  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }
  throw new UsageError(`invalid arguments for ${command}: ${formatIssues(result.error)}`);
}

export function expectArgs(argv: string[], max: number) {
  if (argv.length > max) {
    throw new UsageError(`unexpected argument: ${argv[max]}`);
  }
}

/** The package manager has already logged the details of a failed step. */
export function reportSteps(ctx: CommandContext, steps: StepResult[]) {
  const failed = steps.filter(s => !s.ok).map(s => s.step);
  if (failed.length > 0) {
    ctx.presenter.warn(`package manager step(s) failed: ${failed.join(', ')}; the system may be partially upgraded`);
  }
}

export function reportRelease(ctx: CommandContext, release: ReleaseOutcome) {
  if (release.state === 'kept-writable') {
    ctx.presenter.info(`root filesystem left writable (${release.sentinelPath} present)`);
  } else if (release.state === 'failed') {
    ctx.presenter.warn(release.warning);
  }
}

/** JSON fields describing how the guard was released. */
export function releaseJson(release: ReleaseOutcome): { release: ReleaseOutcome['state']; warning?: string } {
  return release.state === 'failed'
    ? { release: release.state, warning: release.warning }
    : { release: release.state };
}
