import type { PpaConfig } from '@ppactl/contracts';
import { MountGuard } from '../mount/mount-guard';
import type { Privilege } from '../mount/privilege';
import { RepositoryList } from '../repos/repository-list';
import { PackageManager } from '../apt/package-manager';
import { CiResolver } from '../ci/ci-resolver';
import { FetchHttpClient, type HttpClient } from '../utils/http';
import { runCommand, type CommandOutput, type CommandRunner } from '../utils/runCommand';

/** Everything a command operation needs, wired once per process. */
export interface PpaContext {
  config: PpaConfig;
  guard: MountGuard;
  repositories: RepositoryList;
  packages: PackageManager;
  ci: CiResolver;
}

export interface CreateContextOptions {
  config: PpaConfig;
  privilege: Privilege;
  http?: HttpClient;
  run?: CommandRunner;
  /** Where apt-get output goes; `stderr` keeps stdout for JSON output. */
  aptOutput?: CommandOutput;
}

export function createContext(opts: CreateContextOptions): PpaContext {
  const { config, privilege } = opts;
  const http = opts.http ?? new FetchHttpClient({ timeoutMs: config.httpTimeoutMs });
  const run = opts.run ?? runCommand;

  return {
    config,
    guard: new MountGuard(privilege, { sentinelPath: config.sentinelPath }, run),
    repositories: new RepositoryList(config, http),
    packages: new PackageManager(config, run, opts.aptOutput),
    ci: new CiResolver(config, http),
  };
}
