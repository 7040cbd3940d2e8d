/**
 * Tests for the config loader.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  getConfigPath,
  getDefaultConfig,
  loadConfig,
  mergeConfig,
  toEngineSettings,
} from '../../../../src/core/config/loader.js';
import { ConfigError } from '../../../../src/utils/errors.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `optbind-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(testDir, '.optbind'), { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should return the documented defaults', () => {
      expect(getDefaultConfig()).toEqual({
        version: '1.0',
        engine: { terminator: '--', inline_values: true, option_prefixes: ['-'] },
        output: { format: 'human' },
        log_level: 'info',
      });
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when no config file exists', async () => {
      expect(await loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should load and fill in a partial config', async () => {
      await writeFile(
        join(testDir, '.optbind', 'config.yaml'),
        'engine:\n  terminator: null\n  inline_values: false\noutput:\n  format: json\n'
      );

      const config = await loadConfig(testDir);

      expect(config.engine).toEqual({ terminator: null, inline_values: false, option_prefixes: ['-'] });
      expect(config.output.format).toBe('json');
      expect(config.log_level).toBe('info');
    });

    it('should load from an explicit path relative to the project', async () => {
      await writeFile(join(testDir, 'custom.yaml'), 'log_level: debug\n');

      expect((await loadConfig(testDir, 'custom.yaml')).log_level).toBe('debug');
    });

    it('should wrap invalid config in a ConfigError', async () => {
      await writeFile(join(testDir, '.optbind', 'config.yaml'), 'engine:\n  option_prefixes: []\n');

      await expect(loadConfig(testDir)).rejects.toThrow(ConfigError);
      await expect(loadConfig(testDir)).rejects.toThrow(`Failed to load config from ${getConfigPath(testDir)}`);
    });
  });

  describe('mergeConfig', () => {
    it('should fill in missing sections', () => {
      expect(mergeConfig({ log_level: 'warn' }).engine.terminator).toBe('--');
    });
  });

  describe('getConfigPath', () => {
    it('should point inside .optbind', () => {
      expect(getConfigPath(testDir)).toBe(join(testDir, '.optbind', 'config.yaml'));
    });
  });

  describe('toEngineSettings', () => {
    it('should map config fields onto engine settings', () => {
      const config = mergeConfig({
        engine: { terminator: '---', inline_values: false, option_prefixes: ['-', '+'] },
      });

      expect(toEngineSettings(config)).toEqual({
        terminator: '---',
        inlineValues: false,
        optionPrefixes: ['-', '+'],
      });
    });
  });
});
