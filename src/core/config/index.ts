/**
 * Config system entry point
 */

import type { ProbeConfig, LoadConfigOptions, AWSCredentialsConfig } from '../../types/config.js';
import type { EnvSource } from './env.js';
import { loadConfigOptionsSchema, validateConfig } from './schema.js';
import { loadEnvFiles } from './env-loader.js';

export const DEFAULT_REGION = 'us-east-1';

/**
 * Build and validate a config from options and environment variables,
 * without reading any files
 *
 * Region: option > AWS_REGION > AWS_DEFAULT_REGION > us-east-1
 * Profile: option > AWS_PROFILE
 */
export function resolveConfig(
  options: LoadConfigOptions = {},
  source: EnvSource = process.env
): ProbeConfig {
  const { region, profile, accessKeyId, secretAccessKey, sessionToken } =
    loadConfigOptionsSchema.parse(options);

  const credentials: AWSCredentialsConfig = {};
  if (accessKeyId) credentials.accessKeyId = accessKeyId;
  if (secretAccessKey) credentials.secretAccessKey = secretAccessKey;
  if (sessionToken) credentials.sessionToken = sessionToken;

  const resolvedProfile = profile || source.AWS_PROFILE;
  if (resolvedProfile) credentials.profile = resolvedProfile;

  return validateConfig({
    region: region || source.AWS_REGION || source.AWS_DEFAULT_REGION || DEFAULT_REGION,
    credentials: Object.keys(credentials).length > 0 ? credentials : undefined,
  });
}

/**
 * Load .env files, then resolve and validate the configuration
 *
 * @example
 * ```ts
 * // Defaults from the environment
 * const config = await loadConfig();
 *
 * // Load .env.prod and pin a profile
 * const config = await loadConfig({ env: 'prod', profile: 'audit' });
 * ```
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<ProbeConfig> {
  try {
    // .env files must be loaded before anything reads process.env
    loadEnvFiles(options.env);
    return resolveConfig(options, process.env);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load configuration:\n${error.message}`);
    }
    throw error;
  }
}

export { loadEnvFiles, getEnvFilePaths } from './env-loader.js';
export { readEnvironment, type EnvironmentSnapshot, type EnvSource } from './env.js';
export { validateConfig, validateConfigSafe, configSchema } from './schema.js';

// Re-export types
export type { ProbeConfig, LoadConfigOptions } from '../../types/config.js';
