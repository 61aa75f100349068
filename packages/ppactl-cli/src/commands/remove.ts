import { RemoveCommandArgsSchema, ExitCode } from '@ppactl/contracts';
import { remove } from '@ppactl/core';
import type { CommandModule } from './types';
import { expectArgs, parseCommandArgs, releaseJson, reportRelease, reportSteps } from './utils';

export const run: CommandModule['run'] = async (ctx, argv) => {
  expectArgs(argv, 1);
  const args = parseCommandArgs(RemoveCommandArgsSchema, { repo: argv[0] }, 'remove');

  const result = await remove(await ctx.ppa(), args);

  if (ctx.jsonMode) {
    ctx.presenter.json({
      ok: result.ok,
      repository: result.repository,
      steps: result.steps,
      ...releaseJson(result.release),
    });
  } else {
    ctx.presenter.success(`Removed repository ${result.repository}`);
    reportSteps(ctx, result.steps);
    reportRelease(ctx, result.release);
  }

  return result.ok ? ExitCode.Ok : ExitCode.Partial;
};
