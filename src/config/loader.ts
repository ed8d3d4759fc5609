/**
 * Configuration loading: YAML file, then environment overrides, validated
 * with zod.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ENV_VARS, PATHS } from '../constants.js';
import { ConfigNotFoundError, ConfigValidationError } from '../errors/types.js';
import { LOG_LEVELS } from '../logging/logger.js';
import { FAILURE_POLICIES } from '../auth/resolver.js';
import { CONFIG_DEFAULTS } from './defaults.js';

/**
 * Zod schema for authbroker configuration.
 */
export const brokerConfigSchema = z
  .object({
    /** Log level for the broker's pino logger */
    logLevel: z.enum(LOG_LEVELS).default(CONFIG_DEFAULTS.logLevel),
    /** Preferred account for cached user grants; '*' accepts any single match */
    oauthEmail: z.string().min(1).optional(),
    /** Directory of cached user grants */
    oauthCache: z.string().min(1).default(CONFIG_DEFAULTS.oauthCache),
    /** Whether a strategy failure aborts resolution or is folded into the final error */
    failurePolicy: z.enum(FAILURE_POLICIES).default(CONFIG_DEFAULTS.failurePolicy),
    introspectionEndpoint: z.string().url().default(CONFIG_DEFAULTS.introspectionEndpoint),
    tokenUri: z.string().url().default(CONFIG_DEFAULTS.tokenUri),
    timeoutMs: z.number().int().min(100).max(600000).default(CONFIG_DEFAULTS.timeoutMs),
  })
  .strict();

export type BrokerConfig = z.infer<typeof brokerConfigSchema>;

/**
 * Config file names to search for.
 */
export const CONFIG_NAMES = ['authbroker.yaml', 'authbroker.yml', '.authbroker.yaml', '.authbroker.yml'];

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
}

/**
 * Default configuration.
 */
export function getDefaultConfig(): BrokerConfig {
  return brokerConfigSchema.parse({});
}

/**
 * Find the first config file in the working directory, then ~/.authbroker.
 */
export function findConfigFile(options: LoadConfigOptions = {}): string | undefined {
  const searchPaths = [options.cwd ?? process.cwd(), join(options.home ?? homedir(), PATHS.CONFIG_DIR)];
  for (const dir of searchPaths) {
    for (const name of CONFIG_NAMES) {
      const configPath = join(dir, name);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
  }
  return undefined;
}

/**
 * Load configuration from an explicit path, a discovered file, or defaults,
 * then apply environment overrides.
 *
 * @throws ConfigNotFoundError when an explicit path does not exist
 * @throws ConfigValidationError on invalid YAML or values
 */
export function loadConfig(explicitPath?: string, options: LoadConfigOptions = {}): BrokerConfig {
  const path = explicitPath ?? findConfigFile(options);
  if (explicitPath && !existsSync(explicitPath)) {
    throw new ConfigNotFoundError(explicitPath);
  }

  const fromFile = path ? readConfigFile(path) : {};
  const merged = { ...fromFile, ...envOverrides(options.env ?? process.env) };

  const result = brokerConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigValidationError(issues, { metadata: { path } });
  }
  return result.data;
}

function readConfigFile(path: string): Record<string, unknown> {
  const content = readFileSync(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigValidationError(
      [`Invalid YAML in ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`],
      { metadata: { path } }
    );
  }

  // Empty file: defaults
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigValidationError([`${path} must contain a mapping at the top level`], { metadata: { path } });
  }
  return { ...parsed };
}

/**
 * Environment variables that override file values.
 */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const logLevel = env[ENV_VARS.LOG_LEVEL];
  if (logLevel) overrides.logLevel = logLevel.toLowerCase();
  const email = env[ENV_VARS.OAUTH_EMAIL];
  if (email) overrides.oauthEmail = email;
  const cache = env[ENV_VARS.OAUTH_CACHE];
  if (cache) overrides.oauthCache = cache;
  const policy = env[ENV_VARS.FAILURE_POLICY];
  if (policy) overrides.failurePolicy = policy.toLowerCase();
  return overrides;
}

/**
 * Generate default config file content.
 */
export function generateDefaultConfig(): string {
  const defaults = getDefaultConfig();
  return `# authbroker configuration

# debug | info | warn | error | silent
logLevel: ${defaults.logLevel}

# Account to pick among cached user grants ('*' takes the only one)
# oauthEmail: someone@example.com

# Directory holding cached user grants
# oauthCache: ~/.cache/authbroker

# continue: a failing strategy is reported only if nothing else succeeds
# abort:    the first failing strategy stops resolution
failurePolicy: ${defaults.failurePolicy}

# introspectionEndpoint: ${defaults.introspectionEndpoint}
# tokenUri: ${defaults.tokenUri}
timeoutMs: ${defaults.timeoutMs}
`;
}
