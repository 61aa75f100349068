import type { PpaContext } from './context';

/** Names of the enabled repositories, sorted. Read-only: no mount guard. */
export function list(ctx: PpaContext): Promise<string[]> {
  return ctx.repositories.listAll();
}
