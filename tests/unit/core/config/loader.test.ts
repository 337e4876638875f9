/**
 * Tests for the config loader.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadConfig,
  getDefaultConfig,
  mergeConfig,
  getConfigPath,
} from '../../../../src/core/config/loader.js';
import { ConfigError } from '../../../../src/utils/errors.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `argcheck-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should return the documented defaults', () => {
      const config = getDefaultConfig();

      expect(config.modules).toEqual(['commandline']);
      expect(config.strict_groups).toBe(false);
      expect(config.rules).toEqual({});
      expect(config.files.include).toEqual(['**/*.ts', '**/*.tsx']);
    });
  });

  describe('loadConfig', () => {
    it('should fall back to defaults when no config file exists', async () => {
      const config = await loadConfig(testDir);

      expect(config).toEqual(getDefaultConfig());
    });

    it('should load values from .argcheck.yaml', async () => {
      await writeFile(join(testDir, '.argcheck.yaml'), [
        'modules: ["@acme/args"]',
        'strict_groups: true',
        'rules:',
        '  DuplicateArgumentName: warning',
      ].join('\n'));

      const config = await loadConfig(testDir);

      expect(config.modules).toEqual(['@acme/args']);
      expect(config.strict_groups).toBe(true);
      expect(config.rules).toEqual({ DuplicateArgumentName: 'warning' });
      expect(config.files.exclude).toContain('**/node_modules/**');
    });

    it('should load an explicit config path', async () => {
      await writeFile(join(testDir, 'custom.yaml'), 'strict_groups: true\n');

      const config = await loadConfig(testDir, 'custom.yaml');

      expect(config.strict_groups).toBe(true);
    });

    it('should throw ConfigError for a missing explicit path', async () => {
      await expect(loadConfig(testDir, 'missing.yaml')).rejects.toBeInstanceOf(ConfigError);
    });

    it('should throw ConfigError for unknown rules', async () => {
      await writeFile(join(testDir, '.argcheck.yaml'), 'rules:\n  NotARule: error\n');

      await expect(loadConfig(testDir)).rejects.toThrow(/Unknown rule: NotARule/);
    });

    it('should treat an empty file as defaults', async () => {
      await writeFile(join(testDir, '.argcheck.yaml'), '');

      expect(await loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should throw ConfigError for invalid severities', async () => {
      await writeFile(join(testDir, '.argcheck.yaml'), 'rules:\n  DuplicateArgumentName: fatal\n');

      await expect(loadConfig(testDir)).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('mergeConfig', () => {
    it('should fill defaults around partial values', () => {
      const config = mergeConfig({ strict_groups: true });

      expect(config.strict_groups).toBe(true);
      expect(config.modules).toEqual(['commandline']);
    });
  });

  describe('getConfigPath', () => {
    it('should point at .argcheck.yaml in the project root', () => {
      expect(getConfigPath('/project')).toBe(join('/project', '.argcheck.yaml'));
    });
  });
});
