/** Source of uniform draws in [0, 1). */
interface RandomSource {
  next(): number;
}

const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Deterministic mulberry32 generator.
 */
function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/** Inclusive on both ends. */
function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}

function pick<T>(rng: RandomSource, items: readonly T[]): T {
  const item = items[Math.floor(rng.next() * items.length)];
  if (item === undefined) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return item;
}

/** `count` distinct items in draw order. */
function sample<T>(rng: RandomSource, items: readonly T[], count: number): T[] {
  const pool = [...items];
  const chosen: T[] = [];
  while (chosen.length < count && pool.length > 0) {
    const [item] = pool.splice(Math.floor(rng.next() * pool.length), 1);
    if (item !== undefined) {
      chosen.push(item);
    }
  }
  return chosen;
}

/** Box-Muller transform. */
function gaussian(rng: RandomSource, mean: number, stdDev: number): number {
  const u1 = 1 - rng.next();
  const u2 = rng.next();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stdDev;
}

type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or early when `signal` aborts. */
const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, Math.max(0, ms));
    signal?.addEventListener('abort', done, { once: true });
  });

export { createSeededRandom, gaussian, mathRandom, pick, randomInt, sample, sleep, uniform };
export type { RandomSource, Sleep };
