/**
 * Capability handed to the mount guard. Computed once at start-up from the
 * effective uid and passed down explicitly.
 */
export interface Privilege {
  readonly uid: number;
  readonly root: boolean;
}

export function detectPrivilege(): Privilege {
  const uid = typeof process.geteuid === 'function' ? process.geteuid() : -1;
  return Object.freeze({ uid, root: uid === 0 });
}
