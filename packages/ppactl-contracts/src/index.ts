// Main barrel export for @ppactl/contracts

export * from './schema';
export { BuildStatus } from './build-status';
export { ExitCode } from './exit-codes';
