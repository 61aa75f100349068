// Main barrel export for @ppactl/core

export * from './api';

export { MountGuard, withWritableRoot } from './mount/mount-guard';
export type { MountGuardOptions, ReleaseOutcome, Guarded } from './mount/mount-guard';
export { detectPrivilege } from './mount/privilege';
export type { Privilege } from './mount/privilege';
export { RepositoryList, assertRepositoryName } from './repos/repository-list';
export type { RepositoryListConfig } from './repos/repository-list';
export { PackageManager } from './apt/package-manager';
export type { PackageManagerConfig, PackageStep, StepResult } from './apt/package-manager';
export { CiResolver, parseProject, toBuildStatus } from './ci/ci-resolver';
export type { CiResolverConfig, ProjectRef } from './ci/ci-resolver';

export { loadConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_PATH } from './config/config';
export type { LoadConfigOptions } from './config/config';

export {
  PpaError,
  PermissionError,
  NotFoundError,
  BuildGateError,
  MountError,
  ValidationError,
  ConfigError,
  UsageError,
  errorMessage,
} from './errors';
export type { PpaErrorCode } from './errors';

export { logger, setLogLevel, isLogLevel } from './utils/logger';
export type { LogLevel } from './utils/logger';
export { runCommand, CommandFailedError } from './utils/runCommand';
export type { CommandOutput, CommandRunner, RunCommandOptions, RunCommandResult } from './utils/runCommand';
export { FetchHttpClient } from './utils/http';
export type { HttpClient, HttpRequest, HttpResponse } from './utils/http';
export { formatIssues } from './utils/zod';
