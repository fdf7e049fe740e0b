/**
 * Credential chain tests
 */

import { describe, it, expect } from '@jest/globals';
import { CredentialChain } from '../../../core/aws/chain.js';
import { CredentialChainError } from '../../../core/aws/errors.js';
import { createLoggerMock, credentials, fakeProvider } from '../../helpers/fakes.js';

describe('CredentialChain', () => {
  it('should not invoke any provider until credentials are requested', () => {
    const first = fakeProvider('config', credentials('config-key'));
    const second = fakeProvider('environment', credentials('env-key'));

    const chain = new CredentialChain([first, second]);

    expect(chain.sources).toEqual(['config', 'environment']);
    expect(first.retrieve).not.toHaveBeenCalled();
    expect(second.retrieve).not.toHaveBeenCalled();
    expect(chain.isExpired()).toBe(true);
  });

  it('should stop at the first provider that succeeds', async () => {
    const first = fakeProvider('config', credentials('config-key'));
    const second = fakeProvider('environment', credentials('env-key'));

    const resolution = await new CredentialChain([first, second]).resolve();

    expect(resolution.credentials.accessKeyId).toBe('config-key');
    expect(resolution.source).toBe('config');
    expect(second.retrieve).not.toHaveBeenCalled();
  });

  it('should skip providers that fail or return empty credentials', async () => {
    const logger = createLoggerMock();
    const failing = fakeProvider('config', new Error('static credentials are empty'));
    const empty = fakeProvider('environment', credentials('', ''));
    const working = fakeProvider('profile', credentials('profile-key'));

    const chain = new CredentialChain([failing, empty, working], { logger });
    const resolution = await chain.resolve();

    expect(resolution.source).toBe('profile');
    expect(chain.source).toBe('profile');
    expect(failing.retrieve).toHaveBeenCalledTimes(1);
    expect(empty.retrieve).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith('Credential provider skipped', {
      source: 'environment',
      error: 'provider returned empty credentials',
    });
  });

  it('should fail with every provider error when none succeed', async () => {
    const chain = new CredentialChain([
      fakeProvider('config', new Error('static credentials are empty')),
      fakeProvider('environment', new Error('Unable to find environment variable credentials.')),
    ]);

    const error = await chain.resolve().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CredentialChainError);
    expect(error).toMatchObject({
      message:
        'No valid credential source found in chain.\n' +
        '2 errors occurred:\n' +
        '\t* config: static credentials are empty\n' +
        '\t* environment: Unable to find environment variable credentials.\n',
    });
  });

  it('should fail on an empty chain', async () => {
    await expect(new CredentialChain([]).resolve()).rejects.toThrow(
      'No valid credential source found in chain.'
    );
  });

  it('should cache resolved credentials', async () => {
    const provider = fakeProvider('config', credentials('config-key'));
    const chain = new CredentialChain([provider]);

    await chain.resolve();
    await chain.resolve();

    expect(provider.retrieve).toHaveBeenCalledTimes(1);
    expect(chain.isExpired()).toBe(false);
  });

  it('should share one evaluation between concurrent calls', async () => {
    const provider = fakeProvider('config', credentials('config-key'));
    const chain = new CredentialChain([provider]);

    const [a, b] = await Promise.all([chain.resolve(), chain.resolve()]);

    expect(a).toBe(b);
    expect(provider.retrieve).toHaveBeenCalledTimes(1);
  });

  it('should re-evaluate after invalidate', async () => {
    const provider = fakeProvider('config', credentials('config-key'));
    const chain = new CredentialChain([provider]);

    await chain.resolve();
    chain.invalidate();

    expect(chain.isExpired()).toBe(true);
    await chain.resolve();
    expect(provider.retrieve).toHaveBeenCalledTimes(2);
  });

  it('should re-evaluate once credentials expire', async () => {
    let now = new Date('2030-01-01T00:00:00Z');
    const provider = fakeProvider('instance-metadata', {
      ...credentials('instance-key'),
      expiration: new Date('2030-01-01T01:00:00Z'),
    });
    const chain = new CredentialChain([provider], { now: () => now });

    await chain.resolve();
    expect(chain.isExpired()).toBe(false);

    now = new Date('2030-01-01T01:00:00Z');
    expect(chain.isExpired()).toBe(true);

    await chain.resolve();
    expect(provider.retrieve).toHaveBeenCalledTimes(2);
  });

  it('should expose the chain as an SDK credential provider', async () => {
    const chain = new CredentialChain([fakeProvider('config', credentials('config-key'))]);

    const creds = await chain.toProvider()();

    expect(creds).toEqual({ accessKeyId: 'config-key', secretAccessKey: 'test-secret' });
  });
});
