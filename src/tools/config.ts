/**
 * huffman_config - Show or change huffpack settings
 */

import { z } from 'zod';
import type { HuffpackConfig } from '../types.js';
import { getConfigForDisplay, updateConfig, validateConfig } from '../config/index.js';

export const configInputSchema = z.object({
  show: z.boolean().optional(),
  max_input_bytes: z.number().int().positive().optional(),
  verify_roundtrip: z.boolean().optional(),
  archive_enabled: z.boolean().optional(),
});

export type ConfigInput = z.infer<typeof configInputSchema>;

export interface ConfigResult {
  success: boolean;
  config?: Record<string, unknown>;
  message: string;
  warnings?: string[];
}

/**
 * Configure huffpack settings
 */
export function config(input: ConfigInput): ConfigResult {
  const updates: Partial<HuffpackConfig> = {};
  if (input.max_input_bytes !== undefined) updates.max_input_bytes = input.max_input_bytes;
  if (input.verify_roundtrip !== undefined) updates.verify_roundtrip = input.verify_roundtrip;
  if (input.archive_enabled !== undefined) updates.archive_enabled = input.archive_enabled;

  const changed = Object.keys(updates);
  if (changed.length > 0) {
    updateConfig(updates);
  }

  const validation = validateConfig();
  let message: string;
  if (changed.length > 0) {
    message = `Updated ${changed.join(', ')}.`;
    if (input.archive_enabled !== undefined) {
      message += ' Restart the server for archive_enabled to take effect.';
    }
  } else if (input.show) {
    message = 'Current configuration:';
  } else {
    message = `Huffpack configuration. Use parameters to update settings:
- max_input_bytes: Largest input accepted for compression, in bytes
- verify_roundtrip: Decompress every container after writing it and compare (true/false)
- archive_enabled: Store named containers in the SQLite archive (true/false)
- show: Display current configuration`;
  }

  return {
    success: true,
    config: getConfigForDisplay(),
    message,
    warnings: validation.issues.length > 0 ? validation.issues : undefined,
  };
}

/**
 * Tool definition for MCP
 */
export const configToolDef = {
  name: 'huffman_config',
  description: 'Show or update huffpack settings such as the input size limit and round-trip verification.',
  inputSchema: {
    type: 'object',
    properties: {
      show: {
        type: 'boolean',
        description: 'Display current configuration settings.',
      },
      max_input_bytes: {
        type: 'number',
        minimum: 1,
        description: 'Largest input accepted for compression, in bytes.',
      },
      verify_roundtrip: {
        type: 'boolean',
        description: 'Decompress every container after compressing and compare with the input.',
      },
      archive_enabled: {
        type: 'boolean',
        description: 'Enable or disable archive storage (takes effect on restart).',
      },
    },
  },
};
