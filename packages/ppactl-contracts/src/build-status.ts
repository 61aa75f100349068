/** Outcome of the latest CI run for a branch, derived at query time. */
export enum BuildStatus {
  Success = 'success',
  Building = 'building',
  Failed = 'failed',
}
