/**
 * Huffman Module
 *
 * Static Huffman coding over bytes with a self-describing container.
 */

export * from './types.js';
export * from './errors.js';
export * from './frequency.js';
export * from './heap.js';
export * from './tree.js';
export * from './codes.js';
export * from './bits.js';
export * from './encoder.js';
export * from './decoder.js';
export * from './container.js';
export * from './codec.js';
