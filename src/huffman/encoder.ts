/**
 * Huffman Encoder - maps input bytes through a code table into packed bits
 */

import { BitWriter } from './bits.js';
import { UnknownSymbolError } from './errors.js';
import type { CodeTable, EncodedPayload } from './types.js';

/**
 * Encode every byte of the input with its code, MSB-first, zero-padding the final byte
 */
export function encode(input: Uint8Array, codes: CodeTable): EncodedPayload {
  const writer = new BitWriter(input.length);

  for (let i = 0; i < input.length; i++) {
    const code = codes.get(input[i]);
    if (!code) {
      throw new UnknownSymbolError(input[i], i);
    }
    writer.writeBits(code);
  }

  return {
    payload: writer.toUint8Array(),
    bitLength: writer.bitLength,
  };
}
