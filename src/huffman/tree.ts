/**
 * Huffman Tree Builder
 *
 * Greedy construction over a min-heap keyed on (frequency, sequence).
 * Leaves take sequence numbers 0..n-1 in ascending symbol order and every
 * merged node takes the next free number, so equal frequencies always
 * resolve the same way. The first node popped becomes the left child
 * (bit 0), the second the right child (bit 1).
 */

import { MinHeap } from './heap.js';
import { InvalidInputError } from './errors.js';
import type { FrequencyTable, HuffmanNode, HuffmanTree } from './types.js';
import { MAX_SYMBOLS, NO_CHILD } from './types.js';

interface QueueEntry {
  index: number;     // arena index
  frequency: number;
  sequence: number;
}

function compareEntries(a: QueueEntry, b: QueueEntry): number {
  return a.frequency - b.frequency || a.sequence - b.sequence;
}

function validateTable(table: FrequencyTable): Array<[number, number]> {
  if (table.size === 0) {
    throw new InvalidInputError('Cannot build a Huffman tree from an empty frequency table');
  }

  const entries = [...table.entries()].sort((a, b) => a[0] - b[0]);
  for (const [symbol, frequency] of entries) {
    if (!Number.isInteger(symbol) || symbol < 0 || symbol >= MAX_SYMBOLS) {
      throw new InvalidInputError(`Symbol out of byte range: ${symbol}`, { symbol });
    }
    if (!Number.isSafeInteger(frequency) || frequency < 1) {
      throw new InvalidInputError(`Frequency for symbol ${symbol} must be a positive integer, got ${frequency}`, {
        symbol,
        frequency,
      });
    }
  }
  return entries;
}

/**
 * Build the Huffman tree for a non-empty frequency table
 */
export function buildTree(table: FrequencyTable): HuffmanTree {
  const entries = validateTable(table);
  const nodes: HuffmanNode[] = entries.map(([symbol, frequency]): HuffmanNode => ({
    kind: 'leaf',
    symbol,
    frequency,
  }));

  // One distinct symbol: give it a real edge so its code is a single 0 bit
  if (nodes.length === 1) {
    nodes.push({ kind: 'internal', frequency: nodes[0].frequency, left: 0, right: NO_CHILD });
    return { nodes, root: 1 };
  }

  const queue = new MinHeap<QueueEntry>(compareEntries);
  nodes.forEach((node, index) => {
    queue.push({ index, frequency: node.frequency, sequence: index });
  });

  let sequence = nodes.length;
  while (queue.size > 1) {
    const left = queue.pop();
    const right = queue.pop();
    if (!left || !right) break;

    const frequency = left.frequency + right.frequency;
    nodes.push({ kind: 'internal', frequency, left: left.index, right: right.index });
    queue.push({ index: nodes.length - 1, frequency, sequence: sequence++ });
  }

  return { nodes, root: nodes.length - 1 };
}

/**
 * Visit every leaf with its depth
 */
function walkLeaves(tree: HuffmanTree, visit: (symbol: number, frequency: number, depth: number) => void): void {
  const stack: Array<[number, number]> = [[tree.root, 0]];
  while (stack.length > 0) {
    const top = stack.pop();
    if (!top) break;
    const [index, depth] = top;
    const node = tree.nodes[index];
    if (node.kind === 'leaf') {
      visit(node.symbol, node.frequency, depth);
      continue;
    }
    if (node.right !== NO_CHILD) stack.push([node.right, depth + 1]);
    if (node.left !== NO_CHILD) stack.push([node.left, depth + 1]);
  }
}

/**
 * Code length (leaf depth) of every symbol in the tree
 */
export function codeLengths(tree: HuffmanTree): Map<number, number> {
  const lengths = new Map<number, number>();
  walkLeaves(tree, (symbol, _frequency, depth) => {
    lengths.set(symbol, depth);
  });
  return lengths;
}

/**
 * Sum of frequency x depth over all leaves; the encoded size in bits
 */
export function weightedPathLength(tree: HuffmanTree): number {
  let total = 0;
  walkLeaves(tree, (_symbol, frequency, depth) => {
    total += frequency * depth;
  });
  return total;
}
