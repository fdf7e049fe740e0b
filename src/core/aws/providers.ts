/**
 * Credential provider variants used by the chain
 */

import {
  fromEnv,
  fromIni,
  fromContainerMetadata,
} from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type { AWSCredentialsConfig } from '../../types/config.js';
import type {
  AWSCredentials,
  CredentialProvider,
  CredentialSource,
} from '../../types/aws.js';
import type { MetadataClient } from './metadata.js';

/**
 * Factories for the SDK-backed providers; swapped out in tests
 */
export interface CredentialProviderFactories {
  fromEnv(): AwsCredentialIdentityProvider;
  fromIni(init: { profile?: string }): AwsCredentialIdentityProvider;
  fromContainerMetadata(init: { timeout: number; maxRetries: number }): AwsCredentialIdentityProvider;
}

export const sdkProviderFactories: CredentialProviderFactories = {
  fromEnv: () => fromEnv(),
  fromIni: (init) => fromIni(init),
  fromContainerMetadata: (init) => fromContainerMetadata(init),
};

/**
 * Explicit credentials from the configuration
 */
export class StaticCredentialProvider implements CredentialProvider {
  readonly source: CredentialSource = 'config';

  constructor(private readonly value: AWSCredentialsConfig = {}) {}

  async retrieve(): Promise<AWSCredentials> {
    const { accessKeyId, secretAccessKey, sessionToken } = this.value;
    if (!accessKeyId || !secretAccessKey) {
      throw new Error('static credentials are empty');
    }
    return { accessKeyId, secretAccessKey, sessionToken };
  }
}

/**
 * Adapts an AWS SDK credential provider function
 */
export class SdkCredentialProvider implements CredentialProvider {
  constructor(
    readonly source: CredentialSource,
    private readonly provider: AwsCredentialIdentityProvider,
    readonly profile?: string
  ) {}

  retrieve(): Promise<AWSCredentials> {
    return this.provider();
  }
}

/**
 * Role credentials served by the instance metadata service
 */
export class InstanceMetadataRoleProvider implements CredentialProvider {
  readonly source: CredentialSource = 'instance-metadata';

  constructor(private readonly client: MetadataClient) {}

  retrieve(): Promise<AWSCredentials> {
    return this.client.roleCredentials();
  }
}
