// ============================================================================
// TIMING - Injectable random source and clock
// ============================================================================
// Every randomized delay, scroll amount and pointer position is drawn from a
// Random, and every wait goes through a Clock, so tests can run the human
// behavior code instantly and reproducibly.

export interface Random {
  /** Uniform float in [0, 1) */
  next(): number;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export interface Range {
  min: number;
  max: number;
}

export const systemRandom: Random = {
  next: () => Math.random(),
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms))),
};

/**
 * Small deterministic generator (mulberry32) for reproducible runs
 */
export function createSeededRandom(seed: number): Random {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Float drawn uniformly from [min, max]
 */
export function uniform(rng: Random, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/**
 * Integer drawn uniformly from [min, max], both inclusive
 */
export function randomInt(rng: Random, min: number, max: number): number {
  const lo = Math.ceil(Math.min(min, max));
  const hi = Math.floor(Math.max(min, max));
  return lo + Math.floor(rng.next() * (hi - lo + 1));
}

export function pick<T>(rng: Random, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.min(items.length - 1, Math.floor(rng.next() * items.length))];
}
