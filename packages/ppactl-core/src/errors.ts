import { ExitCode } from '@ppactl/contracts';

export type PpaErrorCode =
  | 'permission-denied'
  | 'not-found'
  | 'build-gate'
  | 'mount-failed'
  | 'invalid-argument'
  | 'invalid-config'
  | 'usage';

/**
 * Base class for errors ppactl reports to the user. Anything else reaching
 * the top level is treated as an I/O failure.
 */
export class PpaError extends Error {
  constructor(
    message: string,
    readonly code: PpaErrorCode,
    readonly exitCode: ExitCode = ExitCode.Fatal,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class PermissionError extends PpaError {
  constructor(message = 'this command must be run as root') {
    super(message, 'permission-denied');
  }
}

export class NotFoundError extends PpaError {
  constructor(message: string) {
    super(message, 'not-found');
  }
}

export class BuildGateError extends PpaError {
  constructor(message: string) {
    super(message, 'build-gate');
  }
}

export class MountError extends PpaError {
  constructor(message: string) {
    super(message, 'mount-failed');
  }
}

export class ValidationError extends PpaError {
  constructor(message: string) {
    super(message, 'invalid-argument');
  }
}

export class ConfigError extends PpaError {
  constructor(message: string) {
    super(message, 'invalid-config');
  }
}

export class UsageError extends PpaError {
  constructor(message: string) {
    super(message, 'usage', ExitCode.Usage);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
