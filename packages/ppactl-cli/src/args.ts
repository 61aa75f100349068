import { parseArgs } from 'node:util';
import { UsageError, errorMessage } from '@ppactl/core';

export interface GlobalFlags {
  help: boolean;
  version: boolean;
  verbose: boolean;
  json: boolean;
  config?: string;
}

export interface ParsedArgs {
  flags: GlobalFlags;
  positionals: string[];
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
        verbose: { type: 'boolean', short: 'v' },
        json: { type: 'boolean' },
        config: { type: 'string', short: 'c' },
      },
    });
  } catch (e) {
    throw new UsageError(errorMessage(e));
  }

  const { values, positionals } = parsed;
  return {
    flags: {
      help: values.help ?? false,
      version: values.version ?? false,
      verbose: values.verbose ?? false,
      json: values.json ?? false,
      config: values.config,
    },
    positionals,
  };
}
