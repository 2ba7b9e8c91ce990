/**
 * Code table generation
 */

import type { Bit, CodeTable, HuffmanTree } from './types.js';
import { NO_CHILD } from './types.js';

/**
 * Walk the tree depth-first, 0 for a left edge and 1 for a right edge,
 * and record the path to every leaf.
 */
export function buildCodeTable(tree: HuffmanTree): CodeTable {
  const codes = new Map<number, readonly Bit[]>();
  const path: Bit[] = [];

  const visit = (index: number): void => {
    const node = tree.nodes[index];
    if (node.kind === 'leaf') {
      codes.set(node.symbol, path.slice());
      return;
    }
    if (node.left !== NO_CHILD) {
      path.push(0);
      visit(node.left);
      path.pop();
    }
    if (node.right !== NO_CHILD) {
      path.push(1);
      visit(node.right);
      path.pop();
    }
  };

  visit(tree.root);
  return codes;
}

/**
 * Render code bits as a '0'/'1' string
 */
export function formatCode(code: readonly Bit[]): string {
  return code.join('');
}
