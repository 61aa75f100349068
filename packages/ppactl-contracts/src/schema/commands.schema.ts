import { z } from 'zod';

export const repositoryNameSchema = z
  .string({ required_error: 'repository name is required' })
  .regex(/^[A-Za-z0-9][\w.+-]*$/, 'invalid repository name');

export const InstallCommandArgsSchema = z.object({
  repo: repositoryNameSchema,
  pr: z.coerce
    .number({ invalid_type_error: 'pull request must be a number' })
    .int('pull request must be an integer')
    .min(-1, 'pull request must be a positive integer')
    .default(-1),
});

export const RemoveCommandArgsSchema = z.object({
  repo: repositoryNameSchema,
});

export const ListCommandOutputSchema = z.object({
  ok: z.literal(true),
  repositories: z.array(z.string()),
});

export type InstallCommandArgs = z.infer<typeof InstallCommandArgsSchema>;
export type RemoveCommandArgs = z.infer<typeof RemoveCommandArgsSchema>;
export type ListCommandOutput = z.infer<typeof ListCommandOutputSchema>;
