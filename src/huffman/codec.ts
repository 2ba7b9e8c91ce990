/**
 * Codec facade
 *
 * `encodeContainer` / `decodeContainer` throw HuffmanError subclasses.
 * `compress` / `decompress` wrap them into result values for callers that
 * branch on failure instead of catching.
 */

import { buildFrequencyTable, totalFrequency } from './frequency.js';
import { buildTree } from './tree.js';
import { buildCodeTable, formatCode } from './codes.js';
import { encode } from './encoder.js';
import { decode } from './decoder.js';
import { parseContainer, serializeContainer, headerSize } from './container.js';
import { CorruptStreamError, HuffmanError } from './errors.js';
import type { Container } from './types.js';

export type CodecResult<T> =
  | { success: true; value: T }
  | { success: false; error: HuffmanError };

export interface CodeEntry {
  symbol: number;
  frequency: number;
  code: string;
}

export interface CompressionAnalysis {
  inputBytes: number;
  distinctSymbols: number;
  encodedBits: number;
  containerBytes: number;
  compressionRatio: number;
  averageCodeLength: number;
  entropy: number;
  codes: CodeEntry[];
}

/**
 * Build the table, tree and codes for `input` and encode it
 */
export function encodeContainer(input: Uint8Array): Container {
  const table = buildFrequencyTable(input);
  if (table.size === 0) {
    return { table, bitLength: 0, payload: new Uint8Array(0) };
  }

  const codes = buildCodeTable(buildTree(table));
  const { payload, bitLength } = encode(input, codes);
  return { table, bitLength, payload };
}

/**
 * Rebuild the tree from the container's table and decode its payload
 */
export function decodeContainer(container: Container): Uint8Array {
  if (container.table.size === 0) {
    if (container.bitLength !== 0) {
      throw new CorruptStreamError('Payload present without a symbol table', { bitLength: container.bitLength });
    }
    return new Uint8Array(0);
  }

  const output = decode(container.payload, container.bitLength, buildTree(container.table));
  const expected = totalFrequency(container.table);
  if (output.length !== expected) {
    throw new CorruptStreamError(`Decoded ${output.length} bytes, header declares ${expected}`, {
      decoded: output.length,
      expected,
    });
  }
  return output;
}

function toResult<T>(operation: () => T): CodecResult<T> {
  try {
    return { success: true, value: operation() };
  } catch (error) {
    if (error instanceof HuffmanError) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Compress bytes into a serialized container
 */
export function compress(input: Uint8Array): CodecResult<Uint8Array> {
  return toResult(() => serializeContainer(encodeContainer(input)));
}

/**
 * Decompress a serialized container
 */
export function decompress(bytes: Uint8Array): CodecResult<Uint8Array> {
  return toResult(() => decodeContainer(parseContainer(bytes)));
}

/**
 * Code listing and size statistics for an input
 */
export function analyze(input: Uint8Array): CompressionAnalysis {
  const table = buildFrequencyTable(input);
  const total = input.length;

  if (table.size === 0) {
    return {
      inputBytes: 0,
      distinctSymbols: 0,
      encodedBits: 0,
      containerBytes: headerSize(0),
      compressionRatio: 0,
      averageCodeLength: 0,
      entropy: 0,
      codes: [],
    };
  }

  const codeTable = buildCodeTable(buildTree(table));
  const codes: CodeEntry[] = [];
  let encodedBits = 0;
  let entropy = 0;

  for (const [symbol, frequency] of table) {
    const code = codeTable.get(symbol) ?? [];
    encodedBits += frequency * code.length;
    entropy += (frequency / total) * Math.log2(total / frequency);
    codes.push({ symbol, frequency, code: formatCode(code) });
  }

  codes.sort((a, b) => a.code.length - b.code.length || a.symbol - b.symbol);

  const containerBytes = headerSize(table.size) + Math.ceil(encodedBits / 8);
  return {
    inputBytes: total,
    distinctSymbols: table.size,
    encodedBits,
    containerBytes,
    compressionRatio: total / containerBytes,
    averageCodeLength: encodedBits / total,
    entropy,
    codes,
  };
}
