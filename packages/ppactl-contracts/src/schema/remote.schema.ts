import { z } from 'zod';

/** The subset of the code-hosting pull request payload ppactl reads. */
export const pullRequestSchema = z.object({
  number: z.number().int(),
  state: z.string().optional(),
  head: z.object({
    ref: z.string().min(1),
    sha: z.string().optional(),
  }),
});

export type PullRequestPayload = z.infer<typeof pullRequestSchema>;

/** Latest run of a CI job for one branch. */
export const ciBuildSchema = z.object({
  number: z.number().int().optional(),
  building: z.boolean().optional(),
  result: z.string().nullable().optional(),
  url: z.string().optional(),
});

export type CiBuildPayload = z.infer<typeof ciBuildSchema>;
