import type { PpaContext } from '@ppactl/core';
import type { Presenter } from '../presenter';

export interface CommandContext {
  presenter: Presenter;
  jsonMode: boolean;
  /** Loads configuration and wires the core services on first use. */
  ppa: () => Promise<PpaContext>;
}

export type CommandModule = {
  run: (ctx: CommandContext, argv: string[]) => Promise<number>;
};
