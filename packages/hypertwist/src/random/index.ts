/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

function hash32(input: string) {
  let h = 2166136261;
  for (let i = 0; i < input.length; i += 1) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * Deterministic generator (mulberry32) for reproducible scrambles and solves.
 * Numeric and string seeds are both hashed, so `1` and `'1'` give the same stream.
 */
export function createSeededRandom(seed: number | string): RandomSource {
  let state = hash32(String(seed));
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: RandomSource, maxExclusive: number): number {
  if (!Number.isInteger(maxExclusive) || maxExclusive <= 0) {
    throw new Error(`randomInt requires a positive integer bound, got ${maxExclusive}.`);
  }
  const value = Math.floor(random() * maxExclusive);
  // Guard against sources that return exactly 1.
  return Math.min(value, maxExclusive - 1);
}

export function randomChoice<T>(random: RandomSource, items: ReadonlyArray<T>): T {
  if (items.length === 0) throw new Error('randomChoice requires a non-empty list.');
  return items[randomInt(random, items.length)];
}
