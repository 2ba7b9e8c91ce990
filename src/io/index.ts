/**
 * Byte sources and sinks
 *
 * The codec only sees Uint8Arrays; these adapters move them to and from
 * files and memory, and wire the codec between a source and a sink.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { ByteSink, ByteSource, ErrorInfo } from '../types.js';
import {
  compress,
  decompress,
  isHuffmanError,
  CorruptStreamError,
  InvalidInputError,
} from '../huffman/index.js';

export interface TransferOptions {
  maxInputBytes?: number;
  verify?: boolean;
}

export interface TransferResult {
  success: boolean;
  bytesIn: number;
  bytesOut: number;
  error?: ErrorInfo;
}

export interface MemorySink extends ByteSink {
  bytes(): Uint8Array;
}

/**
 * Read a whole file
 */
export function fileSource(path: string): ByteSource {
  return {
    name: path,
    read: () => new Uint8Array(readFileSync(path)),
  };
}

/**
 * Write a whole file, creating parent directories
 */
export function fileSink(path: string): ByteSink {
  return {
    name: path,
    write: (bytes: Uint8Array) => {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      writeFileSync(path, bytes);
    },
  };
}

export function memorySource(bytes: Uint8Array, name: string = 'memory'): ByteSource {
  return {
    name,
    read: () => bytes,
  };
}

/**
 * Sink that keeps the last write
 */
export function memorySink(name: string = 'memory'): MemorySink {
  let written: Uint8Array = new Uint8Array(0);
  return {
    name,
    write: (bytes: Uint8Array) => {
      written = bytes;
    },
    bytes: () => written,
  };
}

/**
 * Read a source, rejecting input above `maxBytes`
 */
export function readLimited(source: ByteSource, maxBytes?: number): Uint8Array {
  const bytes = source.read();
  if (maxBytes !== undefined && bytes.length > maxBytes) {
    throw new InvalidInputError(`${source.name} is ${bytes.length} bytes, limit is ${maxBytes}`, {
      size: bytes.length,
      limit: maxBytes,
    });
  }
  return bytes;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function failure(bytesIn: number, error: unknown): TransferResult {
  if (!isHuffmanError(error)) {
    throw error;
  }
  return {
    success: false,
    bytesIn,
    bytesOut: 0,
    error: { code: error.code, message: error.message },
  };
}

/**
 * Compress a source into a sink
 */
export function compressTo(source: ByteSource, sink: ByteSink, options: TransferOptions = {}): TransferResult {
  let input: Uint8Array;
  try {
    input = readLimited(source, options.maxInputBytes);
  } catch (error) {
    return failure(0, error);
  }

  const compressed = compress(input);
  if (!compressed.success) {
    return failure(input.length, compressed.error);
  }

  if (options.verify) {
    const check = decompress(compressed.value);
    if (!check.success) {
      return failure(input.length, check.error);
    }
    if (!bytesEqual(check.value, input)) {
      return failure(input.length, new CorruptStreamError(`Verification of ${source.name} failed: output differs from input`));
    }
  }

  sink.write(compressed.value);
  return { success: true, bytesIn: input.length, bytesOut: compressed.value.length };
}

/**
 * Decompress a source into a sink
 */
export function decompressTo(source: ByteSource, sink: ByteSink, options: TransferOptions = {}): TransferResult {
  let input: Uint8Array;
  try {
    input = readLimited(source, options.maxInputBytes);
  } catch (error) {
    return failure(0, error);
  }

  const decompressed = decompress(input);
  if (!decompressed.success) {
    return failure(input.length, decompressed.error);
  }

  sink.write(decompressed.value);
  return { success: true, bytesIn: input.length, bytesOut: decompressed.value.length };
}

export { bytesEqual };
