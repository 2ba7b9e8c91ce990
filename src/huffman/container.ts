/**
 * Container serialization
 *
 * Layout (all integers big-endian):
 *   [4]  distinct symbol count N
 *   N x ([1] symbol, [4] frequency), ascending by symbol
 *   [8]  valid bit count of the payload
 *   [..] packed payload, MSB-first, final byte zero-padded
 *
 * The decoder rebuilds the tree from the frequency table, so the tree
 * shape itself is never stored.
 */

import { InvalidInputError, MalformedContainerError } from './errors.js';
import type { Container } from './types.js';
import { MAX_SYMBOLS } from './types.js';

const COUNT_BYTES = 4;
const ENTRY_BYTES = 5;
const BIT_LENGTH_BYTES = 8;
const MAX_UINT32 = 0xffffffff;

/**
 * Size of the header for a table of `symbolCount` entries
 */
export function headerSize(symbolCount: number): number {
  return COUNT_BYTES + symbolCount * ENTRY_BYTES + BIT_LENGTH_BYTES;
}

/**
 * Write a container to bytes
 */
export function serializeContainer(container: Container): Uint8Array {
  const { table, bitLength, payload } = container;
  const entries = [...table.entries()].sort((a, b) => a[0] - b[0]);

  if (entries.length > MAX_SYMBOLS) {
    throw new InvalidInputError(`Too many symbols: ${entries.length}`);
  }
  if (!Number.isSafeInteger(bitLength) || bitLength < 0 || bitLength > payload.length * 8) {
    throw new InvalidInputError(`Bit length ${bitLength} does not fit a ${payload.length}-byte payload`);
  }

  const payloadBytes = Math.ceil(bitLength / 8);
  const bytes = new Uint8Array(headerSize(entries.length) + payloadBytes);
  const view = new DataView(bytes.buffer);

  let offset = 0;
  view.setUint32(offset, entries.length);
  offset += COUNT_BYTES;

  for (const [symbol, frequency] of entries) {
    if (!Number.isInteger(symbol) || symbol < 0 || symbol >= MAX_SYMBOLS) {
      throw new InvalidInputError(`Symbol out of byte range: ${symbol}`, { symbol });
    }
    if (!Number.isInteger(frequency) || frequency < 1 || frequency > MAX_UINT32) {
      throw new InvalidInputError(`Frequency ${frequency} for symbol ${symbol} does not fit in 32 bits`, {
        symbol,
        frequency,
      });
    }
    view.setUint8(offset, symbol);
    view.setUint32(offset + 1, frequency);
    offset += ENTRY_BYTES;
  }

  view.setBigUint64(offset, BigInt(bitLength));
  offset += BIT_LENGTH_BYTES;

  bytes.set(payload.subarray(0, payloadBytes), offset);
  return bytes;
}

/**
 * Read a container from bytes, checking every header field against the bytes available
 */
export function parseContainer(bytes: Uint8Array): Container {
  if (bytes.length < COUNT_BYTES) {
    throw new MalformedContainerError(`Container too short: ${bytes.length} bytes`, { length: bytes.length });
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const symbolCount = view.getUint32(0);
  if (symbolCount > MAX_SYMBOLS) {
    throw new MalformedContainerError(`Declared symbol count ${symbolCount} exceeds ${MAX_SYMBOLS}`, {
      symbolCount,
    });
  }

  const needed = headerSize(symbolCount);
  if (bytes.length < needed) {
    throw new MalformedContainerError(
      `Declared symbol count ${symbolCount} needs a ${needed}-byte header, got ${bytes.length} bytes`,
      { symbolCount, needed, length: bytes.length }
    );
  }

  const table = new Map<number, number>();
  let offset = COUNT_BYTES;
  let previous = -1;
  for (let i = 0; i < symbolCount; i++) {
    const symbol = view.getUint8(offset);
    const frequency = view.getUint32(offset + 1);
    if (symbol <= previous) {
      throw new MalformedContainerError(`Symbols are not in strictly ascending order at entry ${i}`, {
        entry: i,
        symbol,
      });
    }
    if (frequency === 0) {
      throw new MalformedContainerError(`Zero frequency for symbol ${symbol}`, { entry: i, symbol });
    }
    table.set(symbol, frequency);
    previous = symbol;
    offset += ENTRY_BYTES;
  }

  const rawBitLength = view.getBigUint64(offset);
  offset += BIT_LENGTH_BYTES;
  if (rawBitLength > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new MalformedContainerError(`Bit count ${rawBitLength} is out of range`);
  }
  const bitLength = Number(rawBitLength);

  const payload = bytes.slice(offset);
  if (bitLength > payload.length * 8) {
    throw new MalformedContainerError(
      `Bit count ${bitLength} exceeds the ${payload.length * 8} payload bits available`,
      { bitLength, availableBits: payload.length * 8 }
    );
  }
  if (payload.length > Math.ceil(bitLength / 8)) {
    throw new MalformedContainerError(
      `Payload has ${payload.length} bytes but bit count ${bitLength} needs ${Math.ceil(bitLength / 8)}`,
      { bitLength, payloadBytes: payload.length }
    );
  }
  if (symbolCount === 0 && bitLength !== 0) {
    throw new MalformedContainerError('Empty symbol table with a non-empty payload', { bitLength });
  }

  return { table, bitLength, payload };
}
