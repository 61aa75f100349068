export {
  ppaConfigSchema,
  ppaConfigFileSchema,
} from './schema/config.schema';
export type { PpaConfig, PpaConfigFile } from './schema/config.schema';

export { pullRequestSchema, ciBuildSchema } from './schema/remote.schema';
export type { PullRequestPayload, CiBuildPayload } from './schema/remote.schema';

export {
  repositoryNameSchema,
  InstallCommandArgsSchema,
  RemoveCommandArgsSchema,
  ListCommandOutputSchema,
} from './schema/commands.schema';
export type {
  InstallCommandArgs,
  RemoveCommandArgs,
  ListCommandOutput,
} from './schema/commands.schema';
