/**
 * Environment loader tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { getEnvFilePaths, loadEnvFiles } from '../../../core/config/env-loader.js';

describe('Environment Loader', () => {

  describe('getEnvFilePaths', () => {
    it('should return correct file paths and priorities for an environment', () => {
      const testDir = '/test/project';
      const paths = getEnvFilePaths('ci', testDir);

      expect(paths).toHaveLength(4);

      // Highest priority first
      expect(paths[0].path).toBe(`${testDir}/.env.ci.local`);
      expect(paths[0].priority).toBe(4);

      expect(paths[1].path).toBe(`${testDir}/.env.ci`);
      expect(paths[1].priority).toBe(3);

      expect(paths[2].path).toBe(`${testDir}/.env.local`);
      expect(paths[2].priority).toBe(2);

      expect(paths[3].path).toBe(`${testDir}/.env`);
      expect(paths[3].priority).toBe(1);
    });

    it('should return correct file paths when no environment specified', () => {
      const testDir = '/test/project';
      const paths = getEnvFilePaths(undefined, testDir);

      expect(paths).toHaveLength(2);

      expect(paths[0].path).toBe(`${testDir}/.env.local`);
      expect(paths[0].priority).toBe(2);

      expect(paths[1].path).toBe(`${testDir}/.env`);
      expect(paths[1].priority).toBe(1);
    });

    it('should report which files exist', () => {
      const paths = getEnvFilePaths('ci', '/nonexistent/project');

      expect(paths.every((p) => p.exists === false)).toBe(true);
    });

    it('should use process.cwd() as default directory', () => {
      const cwd = process.cwd();
      const paths = getEnvFilePaths('prod');

      expect(paths[0].path).toBe(`${cwd}/.env.prod.local`);
      expect(paths[1].path).toBe(`${cwd}/.env.prod`);
    });
  });

  describe('loadEnvFiles', () => {
    let dir: string;
    const saved = {
      timeout: process.env.AWS_METADATA_TIMEOUT,
      url: process.env.AWS_METADATA_URL,
    };

    function restore(name: string, value: string | undefined) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'account-probe-env-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
      restore('AWS_METADATA_TIMEOUT', saved.timeout);
      restore('AWS_METADATA_URL', saved.url);
      jest.restoreAllMocks();
    });

    it('should let environment-specific files override the base file', () => {
      writeFileSync(
        join(dir, '.env'),
        'AWS_METADATA_TIMEOUT=1s\nAWS_METADATA_URL=http://127.0.0.1:1338\n'
      );
      writeFileSync(join(dir, '.env.ci'), 'AWS_METADATA_TIMEOUT=3s\n');

      const loaded = loadEnvFiles('ci', dir);

      expect(loaded).toEqual(['.env.ci', '.env']);
      expect(process.env.AWS_METADATA_TIMEOUT).toBe('3s');
      expect(process.env.AWS_METADATA_URL).toBe('http://127.0.0.1:1338');
    });

    it('should return nothing when no files exist', () => {
      expect(loadEnvFiles(undefined, dir)).toEqual([]);
    });

    it('should warn when the environment file is missing', () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => {});

      loadEnvFiles('missing', dir);

      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith(
        expect.stringContaining('.env.missing file not found. Using process environment only')
      );
    });
  });
});
