import type { Rng } from "./types.js";

// mulberry32: small seeded generator, used where results must be repeatable
export const seededRng = (seed: number): Rng => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

/**
 * Uniform sample of min(k, items.length) items without replacement
 * (partial Fisher-Yates). Input order is not modified.
 */
export function sample<T>(items: readonly T[], k: number, rng: Rng = Math.random): T[] {
  const count = Math.max(0, Math.min(Math.floor(k), items.length));
  const pool = items.slice();
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(rng() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}
