/**
 * Growable bit and byte buffers
 *
 * Bits are packed most-significant-bit first. Storage doubles when full,
 * so appends are amortized O(1).
 */

import type { Bit } from './types.js';
import { CorruptStreamError } from './errors.js';

const INITIAL_CAPACITY = 64;

function grow(buffer: Uint8Array, minLength: number): Uint8Array {
  let capacity = Math.max(buffer.length, INITIAL_CAPACITY);
  while (capacity < minLength) {
    capacity *= 2;
  }
  const next = new Uint8Array(capacity);
  next.set(buffer);
  return next;
}

/**
 * Bit-level output buffer. Unused bits of the final byte stay zero.
 */
export class BitWriter {
  private buffer: Uint8Array;
  private bits = 0;

  constructor(capacityBytes: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, capacityBytes));
  }

  get bitLength(): number {
    return this.bits;
  }

  writeBit(bit: Bit): void {
    const byteIndex = this.bits >>> 3;
    if (byteIndex >= this.buffer.length) {
      this.buffer = grow(this.buffer, byteIndex + 1);
    }
    if (bit === 1) {
      this.buffer[byteIndex] |= 0x80 >>> (this.bits & 7);
    }
    this.bits++;
  }

  writeBits(bits: readonly Bit[]): void {
    for (const bit of bits) {
      this.writeBit(bit);
    }
  }

  /**
   * Packed bytes, exactly ceil(bitLength / 8) long
   */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, Math.ceil(this.bits / 8));
  }
}

/**
 * Bit-level input over a packed buffer, bounded by a valid bit count
 */
export class BitReader {
  private position = 0;

  constructor(
    private readonly data: Uint8Array,
    private readonly bitLength: number
  ) {
    if (!Number.isSafeInteger(bitLength) || bitLength < 0) {
      throw new CorruptStreamError(`Invalid bit length: ${bitLength}`, { bitLength });
    }
    if (bitLength > data.length * 8) {
      throw new CorruptStreamError(
        `Bit length ${bitLength} exceeds the ${data.length * 8} bits available`,
        { bitLength, availableBits: data.length * 8 }
      );
    }
  }

  get remaining(): number {
    return this.bitLength - this.position;
  }

  get offset(): number {
    return this.position;
  }

  readBit(): Bit {
    if (this.position >= this.bitLength) {
      throw new CorruptStreamError('Read past the end of the bit stream', { bitLength: this.bitLength });
    }
    const byte = this.data[this.position >>> 3];
    const bit = (byte >>> (7 - (this.position & 7))) & 1;
    this.position++;
    return bit === 1 ? 1 : 0;
  }
}

/**
 * Growable byte output buffer
 */
export class ByteWriter {
  private buffer: Uint8Array;
  private length = 0;

  constructor(capacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, capacity));
  }

  get byteLength(): number {
    return this.length;
  }

  writeByte(value: number): void {
    if (this.length >= this.buffer.length) {
      this.buffer = grow(this.buffer, this.length + 1);
    }
    this.buffer[this.length++] = value;
  }

  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}
