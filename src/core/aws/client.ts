/**
 * AWS Client creation helpers
 */

import { IAMClient } from '@aws-sdk/client-iam';
import { STSClient } from '@aws-sdk/client-sts';
import type { ProbeConfig } from '../../types/config.js';
import type { CredentialChain } from './chain.js';

/**
 * Create STS client that draws credentials from the chain
 */
export function createSTSClient(config: ProbeConfig, chain: CredentialChain): STSClient {
  return new STSClient({
    region: config.region,
    credentials: chain.toProvider(),
  });
}

/**
 * Create IAM client that draws credentials from the chain
 * Note: IAM is a global service; the region only selects the partition endpoint
 */
export function createIAMClient(config: ProbeConfig, chain: CredentialChain): IAMClient {
  return new IAMClient({
    region: config.region,
    credentials: chain.toProvider(),
  });
}
