/**
 * Environment variables loader
 * Loads .env files based on environment name with priority
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import chalk from 'chalk';

/**
 * .env file names for an environment, highest priority first
 */
function envFileNames(environment?: string): string[] {
  const envFiles: string[] = [];

  if (environment) {
    envFiles.push(`.env.${environment}.local`);
    envFiles.push(`.env.${environment}`);
  }
  envFiles.push('.env.local');
  envFiles.push('.env');

  return envFiles;
}

/**
 * Load environment variables based on environment name
 *
 * Priority (highest to lowest):
 * 1. .env.{environment}.local  (e.g., .env.prod.local)
 * 2. .env.{environment}         (e.g., .env.prod)
 * 3. .env.local
 * 4. .env
 *
 * @param environment - Environment name (e.g., 'dev', 'prod')
 * @param configDir - Directory containing .env files (defaults to process.cwd())
 * @returns The files that were loaded, highest priority first
 *
 * @example
 * ```ts
 * // AWS_METADATA_URL / AWS_METADATA_TIMEOUT from .env.ci override .env
 * loadEnvFiles('ci');
 * ```
 */
export function loadEnvFiles(
  environment?: string,
  configDir: string = process.cwd()
): string[] {
  // Loaded lowest priority first, each file overriding the previous ones
  const filesToLoad = envFileNames(environment).reverse();
  const loadedFiles: string[] = [];

  for (const file of filesToLoad) {
    const filePath = resolve(configDir, file);

    if (existsSync(filePath)) {
      dotenvConfig({ path: filePath, override: true });
      loadedFiles.push(file);
    }
  }

  // Warn if environment-specific .env file is missing
  if (environment) {
    const envFilePath = resolve(configDir, `.env.${environment}`);
    const envLocalFilePath = resolve(configDir, `.env.${environment}.local`);

    if (!existsSync(envFilePath) && !existsSync(envLocalFilePath)) {
      console.log(
        chalk.yellow(`  ⚠ Warning: .env.${environment} file not found. Using process environment only`)
      );
    }
  }

  if (process.env.ACCOUNT_PROBE_DEBUG === 'true' && loadedFiles.length > 0) {
    console.log(
      `[account-probe] Loaded environment files: ${[...loadedFiles].reverse().join(', ')}`
    );
  }

  return loadedFiles.reverse();
}

/**
 * Get the list of .env files that would be loaded for an environment
 * Useful for debugging and documentation
 */
export function getEnvFilePaths(
  environment?: string,
  configDir: string = process.cwd()
): { path: string; exists: boolean; priority: number }[] {
  const envFiles = envFileNames(environment);

  return envFiles.map((file, index) => ({
    path: resolve(configDir, file),
    exists: existsSync(resolve(configDir, file)),
    priority: envFiles.length - index, // Higher number = higher priority
  }));
}
