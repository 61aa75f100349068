import type { StepResult } from '../apt/package-manager';
import { withWritableRoot, type ReleaseOutcome } from '../mount/mount-guard';
import type { PpaContext } from './context';
import { refreshAndUpgrade } from './upgrade';

export interface UpdateResult {
  ok: boolean;
  steps: StepResult[];
  release: ReleaseOutcome;
}

export async function update(ctx: PpaContext): Promise<UpdateResult> {
  const { value: steps, release } = await withWritableRoot(ctx.guard, () => refreshAndUpgrade(ctx.packages));
  return { ok: steps.every(s => s.ok), steps, release };
}
