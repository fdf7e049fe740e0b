/**
 * Environment snapshot
 *
 * Every environment variable the credential chain and metadata probe consult
 * is read here once, so the rest of the core never touches process.env.
 */

export const ENV_METADATA_URL = 'AWS_METADATA_URL';
export const ENV_METADATA_TIMEOUT = 'AWS_METADATA_TIMEOUT';
export const ENV_CONTAINER_CREDENTIALS_RELATIVE_URI = 'AWS_CONTAINER_CREDENTIALS_RELATIVE_URI';

export type EnvSource = Record<string, string | undefined>;

export interface EnvironmentSnapshot {
  /** Metadata service endpoint override */
  readonly metadataUrl?: string;

  /** Raw duration string for the metadata client timeout */
  readonly metadataTimeout?: string;

  /** Relative URI of the container credentials endpoint */
  readonly containerCredentialsRelativeUri?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Take a frozen snapshot of the relevant variables
 *
 * @param source - Variables to read from (defaults to process.env)
 */
export function readEnvironment(source: EnvSource = process.env): EnvironmentSnapshot {
  return Object.freeze({
    metadataUrl: nonEmpty(source[ENV_METADATA_URL]),
    metadataTimeout: nonEmpty(source[ENV_METADATA_TIMEOUT]),
    containerCredentialsRelativeUri: nonEmpty(source[ENV_CONTAINER_CREDENTIALS_RELATIVE_URI]),
  });
}
