import { ExitCode } from '@ppactl/contracts';
import {
  PpaError,
  UsageError,
  createContext,
  detectPrivilege,
  errorMessage,
  loadConfig,
  logger,
  setLogLevel,
  type PpaContext,
} from '@ppactl/core';
import { parseCliArgs, type ParsedArgs } from './args';
import { findCommand } from './cli.manifest';
import { VERSION, renderHelp } from './help';
import { createPresenter, shouldColor, type OutputStream, type Presenter } from './presenter';
import type { CommandContext } from './commands/types';

export interface RunCliOptions {
  stdout?: OutputStream;
  stderr?: OutputStream;
  env?: NodeJS.ProcessEnv;
  color?: boolean;
  /** Pre-wired services; skips configuration loading and privilege detection. */
  context?: PpaContext;
}

/**
 * Runs one ppactl invocation and resolves to its exit code. Never rejects
 * for errors it knows how to report.
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const env = options.env ?? process.env;
  const presenter = createPresenter({
    stdout,
    stderr,
    color: options.color ?? shouldColor(stderr, env),
  });

  let args: ParsedArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    return usage(presenter, errorMessage(e));
  }
  const { flags, positionals } = args;

  if (flags.version) {
    presenter.write(VERSION);
    return ExitCode.Ok;
  }
  if (flags.help) {
    presenter.write(renderHelp());
    return ExitCode.Ok;
  }

  const [name, ...rest] = positionals;
  if (name === undefined) {
    return usage(presenter, 'missing command');
  }
  const command = findCommand(name);
  if (!command) {
    return usage(presenter, `unknown command: ${name}`);
  }

  if (flags.verbose) {
    setLogLevel('debug');
  }

  // computed once per process and handed to the mount guard
  const privilege = detectPrivilege();
  let ppa: Promise<PpaContext> | undefined;
  const ctx: CommandContext = {
    presenter,
    jsonMode: flags.json,
    ppa: () => {
      ppa ??= options.context
        ? Promise.resolve(options.context)
        : loadConfig({ path: flags.config, env }).then(config => createContext({
          config,
          privilege,
          aptOutput: flags.json ? 'stderr' : 'inherit',
        }));
      return ppa;
    },
  };

  try {
    const mod = await command.loader();
    return await mod.run(ctx, rest);
  } catch (e) {
    return report(presenter, e, flags.json);
  }
}

function usage(presenter: Presenter, message: string): number {
  presenter.error(message);
  presenter.write('');
  presenter.write(renderHelp());
  return ExitCode.Usage;
}

function report(presenter: Presenter, e: unknown, jsonMode: boolean): number {
  if (e instanceof UsageError) {
    return usage(presenter, e.message);
  }

  const known = e instanceof PpaError;
  const message = known ? e.message : `I/O error: ${errorMessage(e)}`;
  const exitCode = known ? e.exitCode : ExitCode.Fatal;
  if (!known) {
    logger.debug('unexpected failure', { stack: e instanceof Error ? e.stack : String(e) });
  }

  if (jsonMode) {
    presenter.json({ ok: false, error: message, code: known ? e.code : 'io-error' });
  } else {
    presenter.error(message);
  }
  return exitCode;
}

export { VERSION, renderHelp } from './help';
export { commands, findCommand, type CommandManifest } from './cli.manifest';
