/**
 * Configuration tests against a temporary home directory
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadConfig,
  updateConfig,
  resetConfig,
  clearConfigCache,
  getConfigForDisplay,
  getConfigPath,
  validateConfig,
} from '../src/config/index.js';
import { DEFAULT_CONFIG } from '../src/types.js';

const ENV_KEYS = ['HUFFPACK_HOME', 'HUFFPACK_MAX_INPUT_BYTES', 'HUFFPACK_VERIFY', 'HUFFPACK_ARCHIVE'] as const;

describe('Config', () => {
  let home: string;
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    home = mkdtempSync(join(tmpdir(), 'huffpack-config-'));
    process.env.HUFFPACK_HOME = home;
    clearConfigCache();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      if (savedEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = savedEnv[key];
      }
    }
    clearConfigCache();
    vi.restoreAllMocks();
    rmSync(home, { recursive: true, force: true });
  });

  it('should use defaults without a config file', () => {
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should merge values from the config file', () => {
    writeFileSync(join(home, 'config.json'), JSON.stringify({ verify_roundtrip: true, output_extension: '.hf' }));
    expect(loadConfig()).toEqual({ ...DEFAULT_CONFIG, verify_roundtrip: true, output_extension: '.hf' });
  });

  it('should fall back to defaults for an invalid config file', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(join(home, 'config.json'), JSON.stringify({ max_input_bytes: -5 }));

    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it('should fall back to defaults for unparseable JSON', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(join(home, 'config.json'), '{ not json');

    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it('should let environment variables override the file', () => {
    writeFileSync(join(home, 'config.json'), JSON.stringify({ verify_roundtrip: true }));
    process.env.HUFFPACK_MAX_INPUT_BYTES = '1024';
    process.env.HUFFPACK_VERIFY = 'false';
    process.env.HUFFPACK_ARCHIVE = 'false';

    expect(loadConfig()).toEqual({
      ...DEFAULT_CONFIG,
      max_input_bytes: 1024,
      verify_roundtrip: false,
      archive_enabled: false,
    });
  });

  it('should ignore malformed environment values', () => {
    process.env.HUFFPACK_MAX_INPUT_BYTES = 'lots';
    process.env.HUFFPACK_VERIFY = 'yes';
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should persist updates to disk', () => {
    updateConfig({ max_input_bytes: 2048 });

    const saved: unknown = JSON.parse(readFileSync(getConfigPath(), 'utf-8'));
    expect(saved).toMatchObject({ max_input_bytes: 2048 });

    clearConfigCache();
    expect(loadConfig().max_input_bytes).toBe(2048);
  });

  it('should reset to defaults', () => {
    updateConfig({ verify_roundtrip: true });
    expect(resetConfig()).toEqual(DEFAULT_CONFIG);
    clearConfigCache();
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should include paths in the display form', () => {
    expect(getConfigForDisplay()).toMatchObject({
      home_dir: home,
      config_path: join(home, 'config.json'),
    });
  });

  it('should flag a disabled archive', () => {
    expect(validateConfig()).toEqual({ valid: true, issues: [] });
    updateConfig({ archive_enabled: false });
    expect(validateConfig().valid).toBe(false);
  });
});
