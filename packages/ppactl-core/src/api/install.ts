import { BuildStatus } from '@ppactl/contracts';
import type { StepResult } from '../apt/package-manager';
import { withWritableRoot, type ReleaseOutcome } from '../mount/mount-guard';
import { assertRepositoryName } from '../repos/repository-list';
import { logger } from '../utils/logger';
import { BuildGateError } from '../errors';
import type { PpaContext } from './context';
import { refreshAndUpgrade } from './upgrade';

export interface InstallOptions {
  repo: string;
  /** Pull request whose head branch build gates the install; -1 for none. */
  pr?: number;
}

export interface InstallResult {
  ok: boolean;
  /** The repository actually enabled: `repo`, or the pull request's branch. */
  repository: string;
  added: boolean;
  branch?: string;
  status?: BuildStatus;
  steps: StepResult[];
  release: ReleaseOutcome;
}

/**
 * Enables a repository and upgrades the system. With a pull request the
 * head branch's repository is enabled instead, and only when its latest
 * CI build succeeded.
 */
export async function install(ctx: PpaContext, opts: InstallOptions): Promise<InstallResult> {
  const pr = opts.pr ?? -1;
  let repository = opts.repo;
  let branch: string | undefined;
  let status: BuildStatus | undefined;

  if (pr >= 0) {
    branch = await ctx.ci.resolveBranch(opts.repo, pr);
    status = await ctx.ci.resolveBuildStatus(opts.repo, branch);

    if (status === BuildStatus.Failed) {
      throw new BuildGateError(`build of ${opts.repo}#${pr} (${branch}) failed, refusing to install`);
    }
    if (status === BuildStatus.Building) {
      throw new BuildGateError(`${opts.repo}#${pr} (${branch}) is still building, try again later`);
    }
    repository = branchRepository(branch);
  }

  assertRepositoryName(repository);
  logger.info('installing repository', { repository, pr });

  const { value, release } = await withWritableRoot(ctx.guard, async () => {
    const added = await ctx.repositories.add(repository);
    const steps = await refreshAndUpgrade(ctx.packages);
    return { added, steps };
  });

  return {
    ok: value.steps.every(s => s.ok),
    repository,
    added: value.added,
    branch,
    status,
    steps: value.steps,
    release,
  };
}

/** Branch names may contain `/`; the published repository uses `-` instead. */
export function branchRepository(branch: string): string {
  return branch.replace(/[^\w.+-]/g, '-').replace(/^[^A-Za-z0-9]+/, '');
}
