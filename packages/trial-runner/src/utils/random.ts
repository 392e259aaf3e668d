export type RandomSource = () => number;

/**
 * mulberry32: small deterministic generator so a seeded subset can be
 * reproduced across runs. Without a seed Math.random is used.
 */
export function createRandom(seed?: number): RandomSource {
  if (seed === undefined) {
    return Math.random;
  }
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Fisher-Yates pick of `count` distinct items, original order not kept.
export function pickRandom<T>(items: readonly T[], count: number, random: RandomSource): T[] {
  const pool = [...items];
  const limit = Math.min(count, pool.length);
  for (let i = 0; i < limit; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, limit);
}
