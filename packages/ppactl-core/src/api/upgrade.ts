import type { PackageManager, StepResult } from '../apt/package-manager';

/** Index refresh then full upgrade. The upgrade runs even if the refresh failed. */
export async function refreshAndUpgrade(packages: PackageManager): Promise<StepResult[]> {
  const refresh = await packages.refreshIndex();
  const upgrade = await packages.upgradeAll();
  return [refresh, upgrade];
}
