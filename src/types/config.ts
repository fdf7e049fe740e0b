/**
 * Configuration types for account-probe
 */

/**
 * Main account-probe configuration interface
 */
export interface ProbeConfig {
  /** AWS region used for the IAM and STS clients */
  region: string;

  /** AWS credentials configuration */
  credentials?: AWSCredentialsConfig;
}

/**
 * AWS credentials configuration
 */
export interface AWSCredentialsConfig {
  /** AWS profile name from ~/.aws/credentials (provider default when omitted) */
  profile?: string;

  /** AWS access key ID */
  accessKeyId?: string;

  /** AWS secret access key */
  secretAccessKey?: string;

  /** AWS session token (for temporary credentials) */
  sessionToken?: string;
}

/**
 * Load config options
 */
export interface LoadConfigOptions {
  /** Environment name (e.g., 'dev', 'prod') used to pick .env files */
  env?: string;

  /** AWS region override */
  region?: string;

  /** AWS profile override */
  profile?: string;

  /** Explicit access key ID */
  accessKeyId?: string;

  /** Explicit secret access key */
  secretAccessKey?: string;

  /** Explicit session token */
  sessionToken?: string;
}

