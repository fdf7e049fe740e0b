/**
 * Lazily evaluated credential provider chain
 */

import type { AwsCredentialIdentityProvider } from '@aws-sdk/types';
import type {
  CredentialProvider,
  CredentialResolution,
  CredentialSource,
} from '../../types/aws.js';
import { noopLogger, type Logger } from '../utils/logger.js';
import { CredentialChainError, toError } from './errors.js';

export interface CredentialChainOptions {
  logger?: Logger;

  /** Clock used for expiration checks */
  now?: () => Date;
}

/**
 * Tries each provider in order until one yields credentials.
 *
 * Nothing runs until `resolve()` is first called. The winning credentials are
 * cached until they expire or `invalidate()` is called.
 */
export class CredentialChain {
  readonly providers: readonly CredentialProvider[];
  private readonly logger: Logger;
  private readonly now: () => Date;
  private cached?: CredentialResolution;
  private inFlight?: Promise<CredentialResolution>;

  constructor(providers: readonly CredentialProvider[], options: CredentialChainOptions = {}) {
    this.providers = Object.freeze([...providers]);
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());
  }

  get sources(): CredentialSource[] {
    return this.providers.map((p) => p.source);
  }

  /** Source of the cached credentials, if any were resolved */
  get source(): CredentialSource | undefined {
    return this.cached?.source;
  }

  async resolve(): Promise<CredentialResolution> {
    if (this.cached && !this.isExpired()) {
      return this.cached;
    }

    if (!this.inFlight) {
      this.inFlight = this.evaluate().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  /**
   * True when nothing is cached or the cached credentials are past their expiration
   */
  isExpired(): boolean {
    if (!this.cached) {
      return true;
    }
    const { expiration } = this.cached.credentials;
    return expiration !== undefined && expiration.getTime() <= this.now().getTime();
  }

  invalidate(): void {
    this.cached = undefined;
  }

  /**
   * Credential provider function for AWS SDK clients
   */
  toProvider(): AwsCredentialIdentityProvider {
    return async () => (await this.resolve()).credentials;
  }

  private async evaluate(): Promise<CredentialResolution> {
    const errors: Error[] = [];

    for (const provider of this.providers) {
      try {
        const credentials = await provider.retrieve();
        if (!credentials.accessKeyId || !credentials.secretAccessKey) {
          throw new Error('provider returned empty credentials');
        }

        const resolution: CredentialResolution = {
          credentials: Object.freeze({ ...credentials }),
          source: provider.source,
          profile: provider.profile,
        };
        this.cached = resolution;
        this.logger.debug('Resolved credentials', { source: provider.source });
        return resolution;
      } catch (error) {
        const message = toError(error).message;
        this.logger.debug('Credential provider skipped', { source: provider.source, error: message });
        errors.push(new Error(`${provider.source}: ${message}`));
      }
    }

    throw new CredentialChainError(errors);
  }
}
