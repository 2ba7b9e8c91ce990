/**
 * huffman_decompress - Decode a container passed inline or stored in the archive
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ErrorInfo } from '../types.js';
import { getArchive } from '../db/operations.js';
import { decompressTo, memorySink, memorySource } from '../io/index.js';
import { getConfig } from '../config/index.js';
import { toBase64 } from './input.js';

export const decompressInputSchema = z
  .object({
    container: z.string().optional(),
    archiveId: z.number().int().positive().optional(),
    encoding: z.enum(['utf8', 'base64']).default('utf8'),
  })
  .refine((value) => (value.container === undefined) !== (value.archiveId === undefined), {
    message: 'Provide exactly one of "container" or "archiveId"',
  });

export type DecompressInput = z.infer<typeof decompressInputSchema>;

export interface DecompressResult {
  success: boolean;
  text?: string;
  base64?: string;
  bytes?: number;
  error?: ErrorInfo;
}

function loadContainer(db: Database.Database | null, input: DecompressInput): Uint8Array | ErrorInfo {
  if (input.container !== undefined) {
    return new Uint8Array(Buffer.from(input.container, 'base64'));
  }
  if (!db) {
    return { code: 'ARCHIVE_DISABLED', message: 'Archive storage is disabled' };
  }
  const archive = getArchive(db, input.archiveId ?? 0);
  if (!archive) {
    return { code: 'NOT_FOUND', message: `Archive #${input.archiveId} not found` };
  }
  return archive.container;
}

/**
 * Decompress a container back to text or base64 bytes
 */
export function decompressTool(db: Database.Database | null, input: DecompressInput): DecompressResult {
  const container = loadContainer(db, input);
  if (!(container instanceof Uint8Array)) {
    return { success: false, error: container };
  }

  const sink = memorySink('output');
  const transfer = decompressTo(memorySource(container, 'container'), sink, {
    maxInputBytes: getConfig().max_input_bytes,
  });
  if (!transfer.success) {
    return { success: false, error: transfer.error };
  }

  const output = sink.bytes();
  return input.encoding === 'base64'
    ? { success: true, base64: toBase64(output), bytes: output.length }
    : { success: true, text: new TextDecoder().decode(output), bytes: output.length };
}

/**
 * Tool definition for MCP
 */
export const decompressToolDef = {
  name: 'huffman_decompress',
  description: 'Decompress a Huffman container, given inline as base64 or by archive id.',
  inputSchema: {
    type: 'object',
    properties: {
      container: {
        type: 'string',
        description: 'Container bytes, base64 encoded.',
      },
      archiveId: {
        type: 'number',
        description: 'ID of a stored archive. Use instead of container.',
      },
      encoding: {
        type: 'string',
        enum: ['utf8', 'base64'],
        description: 'How to return the decoded bytes. Default: utf8',
      },
    },
  },
};
