/**
 * AWS integration module
 *
 * Provides credential chain assembly, metadata probing and account discovery
 */

// Credentials
export {
  buildCredentialChain,
  getCredentials,
  type BuildCredentialChainOptions,
} from './credentials.js';

export { CredentialChain, type CredentialChainOptions } from './chain.js';

export {
  StaticCredentialProvider,
  SdkCredentialProvider,
  InstanceMetadataRoleProvider,
  sdkProviderFactories,
  type CredentialProviderFactories,
} from './providers.js';

// Metadata service
export { setOptionalEndpoint, type EndpointOptions } from './endpoint.js';
export {
  MetadataClient,
  createMetadataClient,
  createIsolatedTransport,
  resolveMetadataTimeout,
  DEFAULT_METADATA_ENDPOINT,
  DEFAULT_METADATA_TIMEOUT_MS,
  MAX_METADATA_TIMEOUT_MS,
  normalizeEndpoint,
  type MetadataClientOptions,
  type MetadataTransport,
} from './metadata.js';

// Account discovery
export {
  getAccountInfo,
  GET_USER_SOFT_ERROR_CODES,
  type GetAccountInfoOptions,
  type StrategyOutcome,
} from './account.js';
export { parseAccountInfoFromArn } from './arn.js';

// Errors
export {
  ErrorAggregate,
  CredentialChainError,
  AccountResolutionError,
  isAwsServiceError,
  getAwsErrorCode,
  toError,
} from './errors.js';

// Client creation
export { createSTSClient, createIAMClient } from './client.js';

// Re-export types
export type {
  AWSCredentials,
  AWSAccountInfo,
  CredentialProvider,
  CredentialSource,
  CredentialResolution,
  IamInfo,
} from '../../types/aws.js';
