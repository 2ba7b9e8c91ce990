/**
 * Frequency counting over byte input
 */

import type { FrequencyTable } from './types.js';
import { MAX_SYMBOLS } from './types.js';

/**
 * Count occurrences of every byte value present in the input
 */
export function buildFrequencyTable(bytes: Uint8Array): FrequencyTable {
  const counts = new Float64Array(MAX_SYMBOLS);
  for (let i = 0; i < bytes.length; i++) {
    counts[bytes[i]]++;
  }

  const table = new Map<number, number>();
  for (let symbol = 0; symbol < MAX_SYMBOLS; symbol++) {
    if (counts[symbol] > 0) {
      table.set(symbol, counts[symbol]);
    }
  }
  return table;
}

/**
 * Sum of all counts, equal to the length of the input the table was built from
 */
export function totalFrequency(table: FrequencyTable): number {
  let total = 0;
  for (const count of table.values()) {
    total += count;
  }
  return total;
}
