/**
 * Huffman Decoder - walks the tree one bit at a time
 */

import { BitReader, ByteWriter } from './bits.js';
import { CorruptStreamError, InvalidInputError } from './errors.js';
import type { HuffmanTree } from './types.js';
import { NO_CHILD } from './types.js';

/**
 * Decode exactly `bitLength` bits of `payload`. Bit 0 follows the left
 * child, bit 1 the right; reaching a leaf emits its symbol and restarts
 * at the root. Padding beyond `bitLength` is never read.
 */
export function decode(payload: Uint8Array, bitLength: number, tree: HuffmanTree): Uint8Array {
  const rootNode = tree.nodes[tree.root];
  if (!rootNode || rootNode.kind !== 'internal') {
    throw new InvalidInputError('Decoder requires a tree with an internal root node');
  }

  const reader = new BitReader(payload, bitLength);
  const output = new ByteWriter(Math.ceil(bitLength / 8));
  let current = tree.root;

  while (reader.remaining > 0) {
    const offset = reader.offset;
    const node = tree.nodes[current];
    if (node.kind !== 'internal') {
      throw new CorruptStreamError('Decoder reached a leaf without resetting', { offset });
    }

    const child = reader.readBit() === 0 ? node.left : node.right;
    if (child === NO_CHILD || child < 0 || child >= tree.nodes.length) {
      throw new CorruptStreamError(`Bit at offset ${offset} leads to a missing child`, { offset });
    }

    const next = tree.nodes[child];
    if (next.kind === 'leaf') {
      output.writeByte(next.symbol);
      current = tree.root;
    } else {
      current = child;
    }
  }

  if (current !== tree.root) {
    throw new CorruptStreamError('Bit stream ends in the middle of a code', {
      bitLength,
      decodedBytes: output.byteLength,
    });
  }

  return output.toUint8Array();
}
