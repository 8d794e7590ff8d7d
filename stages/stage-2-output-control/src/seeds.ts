const SEED_RANGE = 32767;

/** mulberry32 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Deterministic per-attempt seeds in [0, 32767). The same `seed` always
 * yields the same sequence; attempt i of a retry loop uses seeds[i].
 */
export function prepareSeeds(count: number, seed: number = 42): number[] {
  const random = createRandom(seed);
  return Array.from({ length: Math.max(0, count) }, () =>
    Math.floor(random() * SEED_RANGE)
  );
}
