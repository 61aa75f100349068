import { createPaint } from './colors';

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface Presenter {
  write(line: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  json(payload: unknown): void;
}

export interface PresenterOptions {
  stdout: OutputStream;
  stderr: OutputStream;
  color: boolean;
}

/** Human output goes to stdout; warnings and errors to stderr. */
export function createPresenter({ stdout, stderr, color }: PresenterOptions): Presenter {
  const paint = createPaint(color);

  return {
    write: (line) => { stdout.write(`${line}\n`); },
    info: (message) => { stdout.write(`${paint('dim', message)}\n`); },
    success: (message) => { stdout.write(`${paint('green', '✓')} ${message}\n`); },
    warn: (message) => { stderr.write(`${paint('yellow', 'warning:')} ${message}\n`); },
    error: (message) => { stderr.write(`${paint('red', 'error:')} ${message}\n`); },
    json: (payload) => { stdout.write(`${JSON.stringify(payload)}\n`); },
  };
}

export function shouldColor(stream: OutputStream, env: NodeJS.ProcessEnv): boolean {
  return !('NO_COLOR' in env) && stream.isTTY === true;
}
