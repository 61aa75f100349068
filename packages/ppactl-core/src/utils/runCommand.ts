import { spawn } from 'node:child_process';
import type { StdioOptions } from 'node:child_process';
import { logger } from './logger';

/**
 * Where the child's output goes: `inherit` streams it to the console,
 * `pipe` collects it into the result, `stderr` sends both of its streams to
 * our stderr so stdout stays free for machine-readable output.
 */
export type CommandOutput = 'inherit' | 'pipe' | 'stderr';

export type RunCommandOptions = {
  /** merged over process.env */
  env?: NodeJS.ProcessEnv;
  stdio?: CommandOutput;
};

export type RunCommandResult = { code: number; stdout: string; stderr: string };

export type CommandRunner = (cmd: string, opts?: RunCommandOptions) => Promise<RunCommandResult>;

export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stdout: string,
    readonly stderr: string,
  ) {
    super(`Command failed (${exitCode}): ${command}${stderr ? `\n${stderr}` : ''}`);
    this.name = 'CommandFailedError';
  }
}

function toStdio(output: CommandOutput): StdioOptions {
  return output === 'stderr' ? ['inherit', 2, 2] : output;
}

/**
 * Runs a whole command line through the shell. Rejects with
 * CommandFailedError on a non-zero exit code.
 */
export const runCommand: CommandRunner = (cmd, opts = {}) => {
  const { env, stdio = 'inherit' } = opts;

  logger.debug('runCommand start', { cmd, stdio });

  return new Promise((resolve, reject) => {
    const child = spawn(cmd, [], {
      env: { ...process.env, ...env },
      shell: true,
      stdio: toStdio(stdio),
    });

    let stdout = '';
    let stderr = '';
    child.stdout?.on('data', (c: Buffer) => (stdout += c.toString()));
    child.stderr?.on('data', (c: Buffer) => (stderr += c.toString()));

    child.on('error', (err) => {
      logger.error('runCommand error', { cmd, err: err.message });
      reject(err);
    });

    child.on('close', (code) => {
      logger.debug('runCommand done', { cmd, code, stdoutLen: stdout.length, stderrLen: stderr.length });

      if (code === 0) {
        resolve({ code, stdout, stderr });
      } else {
        reject(new CommandFailedError(cmd, code, stdout, stderr));
      }
    });
  });
};
