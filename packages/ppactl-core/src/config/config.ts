import { ppaConfigFileSchema, ppaConfigSchema, type PpaConfig, type PpaConfigFile } from '@ppactl/contracts';
import { exists, readJson } from '../utils/fs';
import { logger } from '../utils/logger';
import { formatIssues } from '../utils/zod';
import { ConfigError, errorMessage } from '../errors';

export const DEFAULT_CONFIG_PATH = '/etc/ppactl/config.json';

export const DEFAULT_CONFIG: PpaConfig = {
  distributionUrl: 'http://repo.example.com/',
  component: 'main',
  listDir: '/etc/apt/sources.list.d',
  listPrefix: 'ppactl-',
  listSuffix: '.list',
  preferencesDir: '/etc/apt/preferences.d',
  pinPriority: 2000,
  sentinelPath: '/userdata/.writable_image',
  githubApiUrl: 'https://api.github.com',
  ciUrl: 'https://ci.example.com',
  owner: 'example-org',
  httpTimeoutMs: 30_000,
  aptUpdateCommand: 'apt-get update',
  aptUpgradeCommand: 'apt-get dist-upgrade -y',
};

const ENV_KEYS = {
  PPACTL_DISTRIBUTION_URL: 'distributionUrl',
  PPACTL_LIST_DIR: 'listDir',
  PPACTL_PREFERENCES_DIR: 'preferencesDir',
  PPACTL_SENTINEL: 'sentinelPath',
  PPACTL_GITHUB_API_URL: 'githubApiUrl',
  PPACTL_CI_URL: 'ciUrl',
  PPACTL_OWNER: 'owner',
} as const satisfies Record<string, keyof PpaConfig>;

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolves configuration from defaults, then a JSON file, then environment
 * variables. The file is `path`, else `$PPACTL_CONFIG`, else
 * `/etc/ppactl/config.json` when it exists.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<PpaConfig> {
  const env = opts.env ?? process.env;
  const explicit = opts.path ?? env.PPACTL_CONFIG;

  let file: PpaConfigFile = {};
  if (explicit) {
    if (!(await exists(explicit))) {
      throw new ConfigError(`config file not found: ${explicit}`);
    }
    file = await readConfigFile(explicit);
  } else if (await exists(DEFAULT_CONFIG_PATH)) {
    file = await readConfigFile(DEFAULT_CONFIG_PATH);
  }

  const fromEnv: PpaConfigFile = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value) { fromEnv[key] = value; }
  }

  const result = ppaConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...file, ...fromEnv });
  if (!result.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

async function readConfigFile(p: string): Promise<PpaConfigFile> {
  let raw: unknown;
  try {
    raw = await readJson(p);
  } catch (e) {
    throw new ConfigError(`failed to read ${p}: ${errorMessage(e)}`);
  }

  const result = ppaConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`invalid configuration in ${p}: ${formatIssues(result.error)}`);
  }
  logger.debug('config file loaded', { path: p, keys: Object.keys(result.data) });
  return result.data;
}
