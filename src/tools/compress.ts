/**
 * huffman_compress - Compress text or bytes into a Huffman container
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ErrorInfo } from '../types.js';
import { createArchive } from '../db/operations.js';
import { parseContainer } from '../huffman/index.js';
import { compressTo, memorySink, memorySource } from '../io/index.js';
import { getConfig } from '../config/index.js';
import { bytesFields, hasExactlyOneSource, inputToBytes, ONE_SOURCE_MESSAGE, toBase64 } from './input.js';

export const compressInputSchema = z
  .object({
    ...bytesFields,
    name: z.string().min(1).max(200).optional(),
  })
  .refine(hasExactlyOneSource, { message: ONE_SOURCE_MESSAGE });

export type CompressInput = z.infer<typeof compressInputSchema>;

export interface CompressResult {
  success: boolean;
  container?: string;       // base64
  bytesIn?: number;
  bytesOut?: number;
  bitLength?: number;
  compressionRatio?: number;
  archiveId?: number;
  warning?: string;
  error?: ErrorInfo;
}

/**
 * Compress the input, optionally storing the container under `name`
 */
export function compressTool(db: Database.Database | null, input: CompressInput): CompressResult {
  const config = getConfig();
  const sink = memorySink('container');

  const transfer = compressTo(memorySource(inputToBytes(input), 'input'), sink, {
    maxInputBytes: config.max_input_bytes,
    verify: config.verify_roundtrip,
  });
  if (!transfer.success) {
    return { success: false, error: transfer.error };
  }

  const container = sink.bytes();
  let archiveId: number | undefined;
  let warning: string | undefined;

  if (input.name !== undefined) {
    if (db) {
      archiveId = createArchive(db, input.name, container).id;
    } else {
      warning = 'Archive storage is disabled. Container was not stored.';
    }
  }

  return {
    success: true,
    container: toBase64(container),
    bytesIn: transfer.bytesIn,
    bytesOut: transfer.bytesOut,
    bitLength: parseContainer(container).bitLength,
    compressionRatio: transfer.bytesOut > 0 ? transfer.bytesIn / transfer.bytesOut : 0,
    archiveId,
    warning,
  };
}

/**
 * Tool definition for MCP
 */
export const compressToolDef = {
  name: 'huffman_compress',
  description: 'Compress text or base64 bytes with static Huffman coding. Returns the container as base64 and can store it in the archive.',
  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'Text to compress (UTF-8 encoded before compression).',
      },
      base64: {
        type: 'string',
        description: 'Raw bytes to compress, base64 encoded. Use instead of text.',
      },
      name: {
        type: 'string',
        description: 'Store the container in the archive under this unique name.',
      },
    },
  },
};
