/**
 * Account ID discovery
 *
 * Tries a sequence of identity APIs with the resolved credentials and
 * derives the partition and account ID from the first ARN obtained.
 */

import { IAMClient, GetUserCommand, ListRolesCommand } from '@aws-sdk/client-iam';
import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import type { AWSAccountInfo, CredentialSource } from '../../types/aws.js';
import { readEnvironment, type EnvironmentSnapshot } from '../config/env.js';
import { noopLogger, type Logger } from '../utils/logger.js';
import { parseAccountInfoFromArn } from './arn.js';
import {
  AccountResolutionError,
  ErrorAggregate,
  getAwsErrorCode,
  isAwsServiceError,
  toError,
} from './errors.js';
import { createMetadataClient, type MetadataClient } from './metadata.js';

/**
 * iam:GetUser error codes raised for federated or otherwise non-IAM-user
 * credentials; these do not stop the lookup
 */
export const GET_USER_SOFT_ERROR_CODES: ReadonlySet<string> = new Set([
  'AccessDenied',
  'ValidationError',
  'InvalidClientTokenId',
]);

/**
 * Result of a single lookup strategy
 */
export type StrategyOutcome =
  | { kind: 'succeed'; info: AWSAccountInfo }
  | { kind: 'continue'; error: Error }
  | { kind: 'fail'; error: Error };

type Strategy = () => Promise<StrategyOutcome>;

export interface GetAccountInfoOptions {
  iam: IAMClient;
  sts: STSClient;

  /** Which provider produced the credentials the clients use */
  source?: CredentialSource;

  /** Client for the instance metadata lookup (built from `env` when omitted) */
  metadataClient?: MetadataClient;

  env?: EnvironmentSnapshot;

  logger?: Logger;
}

function fromArn(arn: string | undefined, field: string): StrategyOutcome {
  if (!arn) {
    return { kind: 'continue', error: new Error(`Response did not include ${field}`) };
  }
  try {
    return { kind: 'succeed', info: parseAccountInfoFromArn(arn) };
  } catch (error) {
    return { kind: 'continue', error: toError(error) };
  }
}

async function viaInstanceMetadata(
  getClient: () => MetadataClient,
  logger: Logger
): Promise<StrategyOutcome> {
  logger.debug('Trying to get account ID via AWS Metadata API');
  try {
    const info = await getClient().iamInfo();
    return fromArn(info.InstanceProfileArn, 'InstanceProfileArn');
  } catch (error) {
    // Metadata hiccups, or a credential proxy posing as the metadata service;
    // the other lookups may still work
    const err = toError(error);
    logger.debug('Failed to get account info from metadata service', { error: err.message });
    return { kind: 'continue', error: err };
  }
}

async function viaGetUser(iam: IAMClient, logger: Logger): Promise<StrategyOutcome> {
  logger.debug('Trying to get account ID via iam:GetUser');
  try {
    const output = await iam.send(new GetUserCommand({}));
    return fromArn(output.User?.Arn, 'User.Arn');
  } catch (error) {
    const err = toError(error);
    if (isAwsServiceError(err) && GET_USER_SOFT_ERROR_CODES.has(getAwsErrorCode(err))) {
      logger.debug('Getting account ID via iam:GetUser failed', { error: err.message });
      return { kind: 'continue', error: err };
    }
    return {
      kind: 'fail',
      error: new Error(`Failed getting account ID via 'iam:GetUser': ${err.message}`),
    };
  }
}

async function viaCallerIdentity(sts: STSClient, logger: Logger): Promise<StrategyOutcome> {
  logger.debug('Trying to get account ID via sts:GetCallerIdentity');
  try {
    const output = await sts.send(new GetCallerIdentityCommand({}));
    return fromArn(output.Arn, 'Arn');
  } catch (error) {
    const err = toError(error);
    logger.debug('Getting account ID via sts:GetCallerIdentity failed', { error: err.message });
    return { kind: 'continue', error: err };
  }
}

async function viaListRoles(iam: IAMClient, logger: Logger): Promise<StrategyOutcome> {
  logger.debug('Trying to get account ID via iam:ListRoles');
  try {
    const output = await iam.send(new ListRolesCommand({ MaxItems: 1 }));
    const roles = output.Roles ?? [];
    if (roles.length < 1) {
      const err = new Error('Failed to get account ID via iam:ListRoles: No roles available');
      logger.debug(err.message);
      return { kind: 'continue', error: err };
    }
    return fromArn(roles[0].Arn, 'Roles[0].Arn');
  } catch (error) {
    const err = toError(error);
    logger.debug('Failed to get account ID via iam:ListRoles', { error: err.message });
    return { kind: 'continue', error: err };
  }
}

/**
 * Determine the partition and account ID for the credentials behind `iam` and `sts`
 *
 * Order:
 * 1. Instance metadata iam/info (credentials from the instance role), otherwise iam:GetUser
 * 2. sts:GetCallerIdentity
 * 3. iam:ListRoles (first role)
 *
 * @throws AccountResolutionError on an unexpected iam:GetUser error, or once
 * every lookup has failed; `errors` lists each failure
 */
export async function getAccountInfo(options: GetAccountInfoOptions): Promise<AWSAccountInfo> {
  const { iam, sts, source } = options;
  const logger = options.logger ?? noopLogger;

  const first: Strategy =
    source === 'instance-metadata'
      ? () =>
          viaInstanceMetadata(
            () =>
              options.metadataClient ??
              createMetadataClient({ env: options.env ?? readEnvironment(), logger }),
            logger
          )
      : () => viaGetUser(iam, logger);

  const strategies: Strategy[] = [
    first,
    () => viaCallerIdentity(sts, logger),
    () => viaListRoles(iam, logger),
  ];

  const errors = new ErrorAggregate();
  for (const strategy of strategies) {
    const outcome = await strategy();
    switch (outcome.kind) {
      case 'succeed':
        return outcome.info;
      case 'continue':
        errors.append(outcome.error);
        break;
      case 'fail':
        errors.append(outcome.error);
        throw new AccountResolutionError(outcome.error.message, errors.errors);
    }
  }

  throw new AccountResolutionError(
    `Failed getting account ID via all available methods. Errors: ${errors.message}`,
    errors.errors
  );
}
