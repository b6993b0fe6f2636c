/** Source of randomness for hint selection. */
export interface Rng {
  /** Return an integer in [0, max) */
  nextInt(max: number): number;
}

/**
 * Deterministic seeded PRNG using xorshift32.
 * Seed is derived by hashing the seed string into a 32-bit integer.
 */
export class SeededRng implements Rng {
  private state: number;

  constructor(seed: string) {
    let hash = 0;
    for (let i = 0; i < seed.length; i++) {
      hash = ((hash << 5) - hash + seed.charCodeAt(i)) | 0;
    }
    // xorshift cannot leave state 0
    this.state = hash === 0 ? 1 : Math.abs(hash);
  }

  /** Return next pseudo-random 32-bit unsigned integer */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextInt(max: number): number {
    return Math.floor((this.next() / 4294967296) * max);
  }
}

export class MathRandomRng implements Rng {
  nextInt(max: number): number {
    return Math.floor(Math.random() * max);
  }
}
