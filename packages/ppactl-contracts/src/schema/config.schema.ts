import { z } from 'zod';

export const ppaConfigSchema = z.object({
  /** Base URL of the package distribution point, e.g. `http://repo.example.com/`. */
  distributionUrl: z.string().url(),
  component: z.string().min(1),
  listDir: z.string().min(1),
  listPrefix: z.string(),
  listSuffix: z.string().min(1),
  preferencesDir: z.string().min(1),
  /** apt pin priority written for enabled repositories; 0 disables pinning. */
  pinPriority: z.number().int().min(0),
  /** Marker file that keeps the root filesystem writable after release. */
  sentinelPath: z.string().min(1),
  githubApiUrl: z.string().url(),
  ciUrl: z.string().url(),
  owner: z.string().min(1),
  httpTimeoutMs: z.number().int().positive(),
  aptUpdateCommand: z.string().min(1),
  aptUpgradeCommand: z.string().min(1),
});

export type PpaConfig = z.infer<typeof ppaConfigSchema>;

export const ppaConfigFileSchema = ppaConfigSchema.partial().strict();

export type PpaConfigFile = z.infer<typeof ppaConfigFileSchema>;
