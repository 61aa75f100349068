import { ExitCode, type ListCommandOutput } from '@ppactl/contracts';
import { list } from '@ppactl/core';
import type { CommandModule } from './types';
import { expectArgs } from './utils';

export const run: CommandModule['run'] = async (ctx, argv) => {
  expectArgs(argv, 0);
  const repositories = await list(await ctx.ppa());

  if (ctx.jsonMode) {
    const output: ListCommandOutput = { ok: true, repositories };
    ctx.presenter.json(output);
  } else if (repositories.length === 0) {
    ctx.presenter.info('No repositories installed');
  } else {
    repositories.forEach(name => ctx.presenter.write(name));
  }

  return ExitCode.Ok;
};
