/**
 * Configuration Management
 *
 * Settings are stored in <home>/config.json, where <home> is $HUFFPACK_HOME
 * or ~/.huffpack. Environment variables override file values.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import type { HuffpackConfig } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';

const configFileSchema = z
  .object({
    max_input_bytes: z.number().int().positive(),
    verify_roundtrip: z.boolean(),
    archive_enabled: z.boolean(),
    output_extension: z.string().regex(/^\.[A-Za-z0-9._-]+$/),
  })
  .partial();

// In-memory config cache
let currentConfig: HuffpackConfig | null = null;

/**
 * Directory holding config.json and archive.db
 */
export function getHomeDir(): string {
  return process.env.HUFFPACK_HOME || join(homedir(), '.huffpack');
}

export function getConfigPath(): string {
  return join(getHomeDir(), 'config.json');
}

/**
 * Ensure the home directory exists
 */
export function ensureHomeDir(): void {
  const home = getHomeDir();
  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

/**
 * Load configuration from disk or environment
 */
export function loadConfig(): HuffpackConfig {
  if (currentConfig) {
    return currentConfig;
  }

  let config: HuffpackConfig = { ...DEFAULT_CONFIG };
  const configPath = getConfigPath();

  // Try to load from file
  if (existsSync(configPath)) {
    try {
      const parsed = configFileSchema.safeParse(JSON.parse(readFileSync(configPath, 'utf-8')));
      if (parsed.success) {
        config = { ...config, ...parsed.data };
      } else {
        console.error(`Ignoring invalid config file ${configPath}:`, parsed.error.issues);
      }
    } catch (error) {
      console.error('Failed to load config file:', error);
    }
  }

  // Override with environment variables
  const maxInput = Number(process.env.HUFFPACK_MAX_INPUT_BYTES);
  if (Number.isSafeInteger(maxInput) && maxInput > 0) {
    config.max_input_bytes = maxInput;
  }

  const verify = parseBooleanEnv(process.env.HUFFPACK_VERIFY);
  if (verify !== undefined) {
    config.verify_roundtrip = verify;
  }

  const archive = parseBooleanEnv(process.env.HUFFPACK_ARCHIVE);
  if (archive !== undefined) {
    config.archive_enabled = archive;
  }

  currentConfig = config;
  return config;
}

/**
 * Save configuration to disk
 */
export function saveConfig(config: HuffpackConfig): void {
  ensureHomeDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), 'utf-8');
  currentConfig = config;
}

/**
 * Update specific config values
 */
export function updateConfig(updates: Partial<HuffpackConfig>): HuffpackConfig {
  const config = loadConfig();
  const newConfig = { ...config, ...updates };
  saveConfig(newConfig);
  return newConfig;
}

/**
 * Get current config (cached)
 */
export function getConfig(): HuffpackConfig {
  return loadConfig();
}

/**
 * Drop the cached config so the next read goes back to disk and environment
 */
export function clearConfigCache(): void {
  currentConfig = null;
}

/**
 * Get config for display
 */
export function getConfigForDisplay(): Record<string, unknown> {
  const config = loadConfig();
  return {
    ...config,
    home_dir: getHomeDir(),
    config_path: getConfigPath(),
  };
}

/**
 * Reset config to defaults
 */
export function resetConfig(): HuffpackConfig {
  currentConfig = null;
  const config = { ...DEFAULT_CONFIG };
  saveConfig(config);
  return config;
}

/**
 * Validate config and return any issues
 */
export function validateConfig(): { valid: boolean; issues: string[] } {
  const config = loadConfig();
  const issues: string[] = [];

  if (config.max_input_bytes > 0xffffffff) {
    issues.push(`max_input_bytes ${config.max_input_bytes} exceeds the 32-bit frequency field of the container`);
  }

  if (!config.archive_enabled) {
    issues.push('Archive storage is disabled. Compressed output will not be stored.');
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}
