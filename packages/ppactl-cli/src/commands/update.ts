import { ExitCode } from '@ppactl/contracts';
import { update } from '@ppactl/core';
import type { CommandModule } from './types';
import { expectArgs, releaseJson, reportRelease, reportSteps } from './utils';

export const run: CommandModule['run'] = async (ctx, argv) => {
  expectArgs(argv, 0);
  const result = await update(await ctx.ppa());

  if (ctx.jsonMode) {
    ctx.presenter.json({ ok: result.ok, steps: result.steps, ...releaseJson(result.release) });
  } else {
    if (result.ok) {
      ctx.presenter.success('System upgraded');
    }
    reportSteps(ctx, result.steps);
    reportRelease(ctx, result.release);
  }

  return result.ok ? ExitCode.Ok : ExitCode.Partial;
};
