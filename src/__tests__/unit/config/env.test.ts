/**
 * Environment snapshot and config resolution tests
 */

import { describe, it, expect } from '@jest/globals';
import { readEnvironment } from '../../../core/config/env.js';
import { DEFAULT_REGION, resolveConfig } from '../../../core/config/index.js';

describe('readEnvironment', () => {
  it('should read the metadata and container variables', () => {
    const env = readEnvironment({
      AWS_METADATA_URL: 'http://127.0.0.1:1338',
      AWS_METADATA_TIMEOUT: '2s',
      AWS_CONTAINER_CREDENTIALS_RELATIVE_URI: '/v2/credentials/test',
      AWS_REGION: 'eu-west-1',
    });

    expect(env).toEqual({
      metadataUrl: 'http://127.0.0.1:1338',
      metadataTimeout: '2s',
      containerCredentialsRelativeUri: '/v2/credentials/test',
    });
  });

  it('should treat empty values as unset', () => {
    const env = readEnvironment({
      AWS_METADATA_URL: '',
      AWS_METADATA_TIMEOUT: '',
      AWS_CONTAINER_CREDENTIALS_RELATIVE_URI: '',
    });

    expect(env.metadataUrl).toBeUndefined();
    expect(env.metadataTimeout).toBeUndefined();
    expect(env.containerCredentialsRelativeUri).toBeUndefined();
  });

  it('should return a frozen snapshot', () => {
    expect(Object.isFrozen(readEnvironment({}))).toBe(true);
  });
});

describe('resolveConfig', () => {
  it('should default the region', () => {
    expect(resolveConfig({}, {})).toEqual({ region: DEFAULT_REGION, credentials: undefined });
  });

  it('should prefer the region option over the environment', () => {
    const config = resolveConfig(
      { region: 'eu-west-1' },
      { AWS_REGION: 'us-west-2', AWS_DEFAULT_REGION: 'ap-south-1' }
    );

    expect(config.region).toBe('eu-west-1');
  });

  it('should prefer AWS_REGION over AWS_DEFAULT_REGION', () => {
    expect(resolveConfig({}, { AWS_REGION: 'us-west-2', AWS_DEFAULT_REGION: 'ap-south-1' }).region).toBe(
      'us-west-2'
    );
    expect(resolveConfig({}, { AWS_DEFAULT_REGION: 'ap-south-1' }).region).toBe('ap-south-1');
  });

  it('should take the profile from AWS_PROFILE unless given', () => {
    expect(resolveConfig({}, { AWS_PROFILE: 'audit' }).credentials).toEqual({ profile: 'audit' });
    expect(resolveConfig({ profile: 'ops' }, { AWS_PROFILE: 'audit' }).credentials).toEqual({
      profile: 'ops',
    });
  });

  it('should carry static credentials', () => {
    const config = resolveConfig(
      { accessKeyId: 'test-key', secretAccessKey: 'test-secret', sessionToken: 'test-token' },
      {}
    );

    expect(config.credentials).toEqual({
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-token',
    });
  });

  it('should reject a lone access key', () => {
    expect(() => resolveConfig({ accessKeyId: 'test-key' }, {})).toThrow(
      'accessKeyId and secretAccessKey must be provided together'
    );
  });

  it('should reject an invalid region', () => {
    expect(() => resolveConfig({ region: 'mars' }, {})).toThrow('Config validation failed:');
  });
});
