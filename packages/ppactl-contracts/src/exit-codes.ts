export const ExitCode = {
  Ok: 0,
  /** A package manager step failed; everything else completed. */
  Partial: 1,
  Fatal: 3,
  Usage: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
