// ─── Seedable pseudorandom source ──────────────────────────────────────────

/**
 * Explicit randomness handle threaded through every stochastic call.
 * Nothing in the simulation reads `Math.random`.
 */
export interface Rng {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform integer in [0, maxExclusive) */
  nextInt(maxExclusive: number): number;
  /** Uniform float in [min, max) */
  nextFloat(min: number, max: number): number;
  /** Internal state; feed it to `createRng` to resume the same sequence. */
  readonly state: number;
}

/** Mulberry32 generator. Reproducible, not cryptographic. */
export class SeededRng implements Rng {
  private s: number;

  constructor(seed: number) {
    this.s = seed >>> 0;
  }

  next(): number {
    this.s = (this.s + 0x6d2b79f5) >>> 0;
    let t = this.s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(maxExclusive: number): number {
    if (maxExclusive <= 0) return 0;
    return Math.floor(this.next() * maxExclusive);
  }

  nextFloat(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  get state(): number {
    return this.s;
  }
}

export function createRng(seed: number): Rng {
  return new SeededRng(seed);
}
