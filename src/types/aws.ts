/**
 * AWS-related type definitions
 */

import type { AwsCredentialIdentity } from "@aws-sdk/types";

/**
 * AWS credentials (from AWS SDK)
 */
export type AWSCredentials = AwsCredentialIdentity;

/**
 * Account information derived from an ARN
 */
export interface AWSAccountInfo {
  /** ARN partition (aws, aws-cn, aws-us-gov, ...) */
  partition: string;

  /** AWS Account ID */
  accountId: string;
}

/**
 * Credential source type, one per provider variant in the chain
 */
export type CredentialSource =
  | "config"
  | "environment"
  | "profile"
  | "container-metadata"
  | "instance-metadata";

/**
 * A single source of credentials inside a chain
 */
export interface CredentialProvider {
  /** Which variant this provider is */
  readonly source: CredentialSource;

  /** Profile name, for shared-file providers bound to one */
  readonly profile?: string;

  /** Fetch credentials from this source; rejects when the source has none */
  retrieve(): Promise<AWSCredentials>;
}

/**
 * Credential resolution result
 */
export interface CredentialResolution {
  /** Resolved credentials */
  credentials: AWSCredentials;

  /** Source of credentials */
  source: CredentialSource;

  /** Profile name (if using profile) */
  profile?: string;
}

/**
 * Identity document served by the instance metadata service at iam/info
 */
export interface IamInfo {
  Code: string;
  LastUpdated?: string;
  InstanceProfileArn: string;
  InstanceProfileId: string;
}
