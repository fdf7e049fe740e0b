/**
 * AWS credential chain assembly
 */

import type { ProbeConfig } from '../../types/config.js';
import type { CredentialProvider, CredentialResolution } from '../../types/aws.js';
import { readEnvironment, type EnvironmentSnapshot } from '../config/env.js';
import { noopLogger, type Logger } from '../utils/logger.js';
import { CredentialChain } from './chain.js';
import { toError } from './errors.js';
import {
  createMetadataClient,
  resolveMetadataTimeout,
  type MetadataClient,
  type MetadataTransport,
} from './metadata.js';
import {
  InstanceMetadataRoleProvider,
  SdkCredentialProvider,
  StaticCredentialProvider,
  sdkProviderFactories,
  type CredentialProviderFactories,
} from './providers.js';

export interface BuildCredentialChainOptions {
  /** Environment snapshot (defaults to one read from process.env) */
  env?: EnvironmentSnapshot;

  logger?: Logger;

  /** SDK provider factories */
  factories?: CredentialProviderFactories;

  /** Request handler for the metadata client */
  transport?: MetadataTransport;

  /** Clock used for expiration checks */
  now?: () => Date;
}

/**
 * Build the credential chain with priority order:
 * 1. Explicit credentials in config (accessKeyId + secretAccessKey)
 * 2. Environment variables (AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY)
 * 3. Shared credentials file (~/.aws/credentials)
 * 4. ECS container role (only if AWS_CONTAINER_CREDENTIALS_RELATIVE_URI is set)
 * 5. EC2 instance role (only if the metadata service answers)
 *
 * An unusable AWS_METADATA_URL leaves the instance role out instead of failing.
 *
 * Only the metadata availability probe touches the network here; providers
 * are not invoked until credentials are requested from the chain.
 */
export async function buildCredentialChain(
  config: ProbeConfig,
  options: BuildCredentialChainOptions = {}
): Promise<CredentialChain> {
  const env = options.env ?? readEnvironment();
  const logger = options.logger ?? noopLogger;
  const factories = options.factories ?? sdkProviderFactories;
  const profile = config.credentials?.profile;

  const providers: CredentialProvider[] = [
    new StaticCredentialProvider(config.credentials),
    new SdkCredentialProvider('environment', factories.fromEnv()),
    new SdkCredentialProvider('profile', factories.fromIni(profile ? { profile } : {}), profile),
  ];

  const timeoutMs = resolveMetadataTimeout(env, logger);

  if (env.containerCredentialsRelativeUri) {
    providers.push(
      new SdkCredentialProvider(
        'container-metadata',
        factories.fromContainerMetadata({ timeout: timeoutMs, maxRetries: 0 })
      )
    );
    logger.info('ECS container credentials detected, container provider added to auth chain');
  }

  let metadataClient: MetadataClient;
  try {
    metadataClient = createMetadataClient({ env, logger, transport: options.transport, timeoutMs });
  } catch (error) {
    logger.warn('Ignoring unusable AWS metadata API endpoint', {
      endpoint: env.metadataUrl,
      error: toError(error).message,
    });
    return new CredentialChain(providers, { logger, now: options.now });
  }

  // Real AWS replies to a simple metadata request; something else may just
  // happen to be listening on the same IP and port
  if (await metadataClient.available()) {
    providers.push(new InstanceMetadataRoleProvider(metadataClient));
    logger.info('AWS EC2 instance detected via metadata API endpoint, instance role provider added to auth chain', {
      endpoint: metadataClient.endpoint,
    });
  } else {
    logger.info(
      `Ignoring AWS metadata API endpoint at ${env.metadataUrl ?? 'default location'} as it doesn't return any instance-id`
    );
  }

  return new CredentialChain(providers, { logger, now: options.now });
}

/**
 * Resolve credentials for a config through the full chain
 */
export async function getCredentials(
  config: ProbeConfig,
  options: BuildCredentialChainOptions = {}
): Promise<CredentialResolution> {
  const chain = await buildCredentialChain(config, options);
  try {
    return await chain.resolve();
  } catch (error) {
    throw new Error(
      `Failed to resolve AWS credentials.\n` +
        `Please configure credentials using one of:\n` +
        `  1. Command line (--access-key-id + --secret-access-key)\n` +
        `  2. Environment variables (AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY)\n` +
        `  3. AWS profile (~/.aws/credentials)\n` +
        `  4. ECS task role (AWS_CONTAINER_CREDENTIALS_RELATIVE_URI)\n` +
        `  5. IAM role (EC2 instance metadata)\n\n` +
        `Original error: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
