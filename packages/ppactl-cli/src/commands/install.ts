import { InstallCommandArgsSchema, ExitCode } from '@ppactl/contracts';
import { install } from '@ppactl/core';
import type { CommandModule } from './types';
import { expectArgs, parseCommandArgs, releaseJson, reportRelease, reportSteps } from './utils';

export const run: CommandModule['run'] = async (ctx, argv) => {
  expectArgs(argv, 2);
  const args = parseCommandArgs(InstallCommandArgsSchema, { repo: argv[0], pr: argv[1] }, 'install');

  const result = await install(await ctx.ppa(), args);

  if (ctx.jsonMode) {
    ctx.presenter.json({
      ok: result.ok,
      repository: result.repository,
      added: result.added,
      branch: result.branch,
      status: result.status,
      steps: result.steps,
      ...releaseJson(result.release),
    });
  } else {
    if (result.branch !== undefined) {
      ctx.presenter.info(`${args.repo}#${args.pr} builds from ${result.branch}: ${result.status}`);
    }
    ctx.presenter.success(
      result.added
        ? `Enabled repository ${result.repository}`
        : `Repository ${result.repository} was already enabled`,
    );
    reportSteps(ctx, result.steps);
    reportRelease(ctx, result.release);
  }

  return result.ok ? ExitCode.Ok : ExitCode.Partial;
};
