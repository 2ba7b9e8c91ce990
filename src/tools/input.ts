/**
 * Shared input handling for tools that accept text or base64 bytes
 */

import { z } from 'zod';
import type { ErrorInfo } from '../types.js';
import { isHuffmanError } from '../huffman/index.js';

export const bytesFields = {
  text: z.string().optional(),
  base64: z.string().optional(),
};

/**
 * Refinement shared by every schema built on `bytesFields`
 */
export function hasExactlyOneSource(value: { text?: string; base64?: string }): boolean {
  return (value.text === undefined) !== (value.base64 === undefined);
}

export const ONE_SOURCE_MESSAGE = 'Provide exactly one of "text" or "base64"';

export const bytesInputSchema = z
  .object(bytesFields)
  .refine(hasExactlyOneSource, { message: ONE_SOURCE_MESSAGE });

export type BytesInput = z.infer<typeof bytesInputSchema>;

/**
 * UTF-8 bytes of `text`, or the decoded `base64` payload
 */
export function inputToBytes(input: { text?: string; base64?: string }): Uint8Array {
  if (input.text !== undefined) {
    return new TextEncoder().encode(input.text);
  }
  return new Uint8Array(Buffer.from(input.base64 ?? '', 'base64'));
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Error payload for a codec failure; anything else is rethrown
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (isHuffmanError(error)) {
    return { code: error.code, message: error.message };
  }
  throw error;
}
