import type { PpaConfig } from '@ppactl/contracts';
import { runCommand, type CommandOutput, type CommandRunner } from '../utils/runCommand';
import { logger } from '../utils/logger';
import { errorMessage } from '../errors';

export type PackageStep = 'refresh-index' | 'upgrade';

export interface StepResult {
  step: PackageStep;
  ok: boolean;
  error?: string;
}

export type PackageManagerConfig = Pick<PpaConfig, 'aptUpdateCommand' | 'aptUpgradeCommand'>;

/**
 * Delegates to the OS package manager. A failing step is logged and
 * reported in its StepResult; it never throws.
 */
export class PackageManager {
  constructor(
    private readonly config: PackageManagerConfig,
    private readonly run: CommandRunner = runCommand,
    private readonly output: CommandOutput = 'inherit',
  ) {}

  refreshIndex(): Promise<StepResult> {
    return this.step('refresh-index', this.config.aptUpdateCommand);
  }

  upgradeAll(): Promise<StepResult> {
    return this.step('upgrade', this.config.aptUpgradeCommand);
  }

  private async step(step: PackageStep, cmd: string): Promise<StepResult> {
    try {
      await this.run(cmd, { env: { DEBIAN_FRONTEND: 'noninteractive' }, stdio: this.output });
      return { step, ok: true };
    } catch (e) {
      const error = errorMessage(e);
      logger.error(`${step} failed, continuing`, { cmd, error });
      return { step, ok: false, error };
    }
  }
}
