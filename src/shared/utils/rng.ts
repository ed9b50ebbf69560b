/**
 * Seeded pseudo-random number generation.
 *
 * Everything that draws randomness in the engine goes through the
 * `RandomSource` interface so tests can script exact sequences and hosts can
 * replay a game from its seed.
 */

export interface RandomSource {
  /** Integer in [min, max], both inclusive. */
  nextInt(min: number, max: number): number;
}

export interface RngState {
  seed: string | number;
  index: number;
}

// ── Seed hashing + PRNG core ─────────────────────────────────────────

/**
 * cyrb53-style hash; turns an arbitrary string seed into a numeric
 * starting point.
 */
function hashSeed(str: string): number {
  let h1 = 0xdeadbeef;
  let h2 = 0x41c6ce57;
  for (let i = 0; i < str.length; i++) {
    const ch = str.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761);
    h2 = Math.imul(h2 ^ ch, 1597334677);
  }
  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507);
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909);
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507);
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909);
  return 4294967296 * (2097151 & h2) + (h1 >>> 0);
}

/** splitmix32 step mapped onto [0, 1). */
function splitmix32(state: number): number {
  state = (state + 0x9e3779b9) | 0;
  let t = state ^ (state >>> 16);
  t = Math.imul(t, 0x21f0aaad);
  t ^= t >>> 15;
  t = Math.imul(t, 0x735a2d97);
  t ^= t >>> 15;
  return (t >>> 0) / 4294967296;
}

function valueAt(seed: string | number, index: number): number {
  const base = typeof seed === 'string' ? hashSeed(seed) : seed;
  return splitmix32((base + index) | 0);
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Deterministic generator: the same `{ seed, index }` always yields the
 * same sequence, so a game can be resumed mid-stream from `state`.
 */
export class SeededRNG implements RandomSource {
  private readonly seed: string | number;
  private index: number;

  constructor(seed: string | number, index = 0) {
    this.seed = seed;
    this.index = index;
  }

  get state(): RngState {
    return { seed: this.seed, index: this.index };
  }

  /** Float in [0, 1); advances the index. */
  next(): number {
    return valueAt(this.seed, this.index++);
  }

  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }
}

/** Fresh 31-bit seed for a new game. */
export function generateGameSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}
