/**
 * Core Huffman types
 *
 * Symbols are bytes (0..255). Text is UTF-8 encoded before it reaches the codec.
 */

export type Bit = 0 | 1;

/**
 * Symbol -> occurrence count, iterated in ascending symbol order
 */
export type FrequencyTable = ReadonlyMap<number, number>;

/**
 * Symbol -> code bits, root to leaf
 */
export type CodeTable = ReadonlyMap<number, readonly Bit[]>;

export interface LeafNode {
  kind: 'leaf';
  symbol: number;
  frequency: number;
}

export interface InternalNode {
  kind: 'internal';
  frequency: number;
  left: number;   // arena index, or NO_CHILD
  right: number;  // arena index, or NO_CHILD
}

export type HuffmanNode = LeafNode | InternalNode;

/**
 * Arena-backed tree: children are indices into `nodes`
 */
export interface HuffmanTree {
  readonly nodes: readonly HuffmanNode[];
  readonly root: number;
}

export interface EncodedPayload {
  payload: Uint8Array;
  bitLength: number;
}

export interface Container extends EncodedPayload {
  table: FrequencyTable;
}

export const NO_CHILD = -1;
export const MAX_SYMBOLS = 256;
