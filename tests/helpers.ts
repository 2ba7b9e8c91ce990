/**
 * Shared test helpers
 */

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function text(data: Uint8Array): string {
  return new TextDecoder().decode(data);
}

/**
 * Deterministic pseudo-random integers in [0, max)
 */
export function seededRandom(seed: number): (max: number) => number {
  let state = seed >>> 0;
  return (max: number) => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % max;
  };
}

/**
 * Minimum weighted path length over every binary prefix tree for `weights`,
 * found by trying every merge order. Exponential; keep inputs small.
 */
export function bruteForceCost(weights: number[], memo: Map<string, number> = new Map()): number {
  if (weights.length <= 1) return 0;

  const sorted = [...weights].sort((a, b) => a - b);
  const key = sorted.join(',');
  const cached = memo.get(key);
  if (cached !== undefined) return cached;

  let best = Infinity;
  for (let i = 0; i < sorted.length; i++) {
    for (let j = i + 1; j < sorted.length; j++) {
      const merged = sorted[i] + sorted[j];
      const rest = sorted.filter((_, k) => k !== i && k !== j);
      best = Math.min(best, merged + bruteForceCost([...rest, merged], memo));
    }
  }

  memo.set(key, best);
  return best;
}

// "aaaabbbccd" as it appears on the wire
export const SAMPLE_CONTAINER = Uint8Array.from([
  0x00, 0x00, 0x00, 0x04,
  0x61, 0x00, 0x00, 0x00, 0x04,
  0x62, 0x00, 0x00, 0x00, 0x03,
  0x63, 0x00, 0x00, 0x00, 0x02,
  0x64, 0x00, 0x00, 0x00, 0x01,
  0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x13,
  0x0a, 0xbf, 0xc0,
]);
