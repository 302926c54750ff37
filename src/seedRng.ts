/**
 * Random source for opponent assignment and computer move choice.
 * A seed makes every pick reproducible; without one we fall back to
 * Math.random.
 */

// Simple string hash -> 32-bit integer
function xmur3(str: string): () => number {
  let h = 1779033703 ^ str.length;
  for (let i = 0; i < str.length; i++) {
    h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return function () {
    h = Math.imul(h ^ (h >>> 16), 2246822507);
    h = Math.imul(h ^ (h >>> 13), 3266489909);
    h ^= h >>> 16;
    return h >>> 0;
  };
}

// 32-bit PRNG
function mulberry32(a: number): () => number {
  return function () {
    let t = (a += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface Rng {
  nextInt: (maxExclusive: number) => number;
  /** Uniformly picks one element; throws on an empty list. */
  pick: <T>(items: readonly T[]) => T;
}

function fromSource(rand: () => number): Rng {
  const nextInt = (maxExclusive: number): number => {
    if (maxExclusive <= 0) return 0;
    return Math.floor(rand() * maxExclusive);
  };

  return {
    nextInt,
    pick: <T>(items: readonly T[]): T => {
      if (items.length === 0) {
        throw new RangeError("Cannot pick from an empty list");
      }
      return items[nextInt(items.length)];
    },
  };
}

export function createDeterministicRng(seed: string): Rng {
  const seedFn = xmur3(seed);
  return fromSource(mulberry32(seedFn()));
}

export function createRng(seed?: string): Rng {
  return seed === undefined ? fromSource(Math.random) : createDeterministicRng(seed);
}
