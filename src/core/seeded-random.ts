const UINT32_RANGE = 0x1_0000_0000;

/** Thrown for a seed that is not an integer in [0, 2^32 - 1] */
export class InvalidSeedError extends RangeError {
  constructor(readonly value: number) {
    super(`Seed must be an integer in [0, ${UINT32_RANGE - 1}], got ${value}`);
    this.name = 'InvalidSeedError';
  }
}

export function isValidSeed(seed: number): boolean {
  return Number.isInteger(seed) && seed >= 0 && seed < UINT32_RANGE;
}

function checkedSeed(seed: number): number {
  if (!isValidSeed(seed)) throw new InvalidSeedError(seed);
  return seed;
}

/** Mulberry32 PRNG. Deterministic for a given seed, owned per instance. */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = checkedSeed(seed);
  }

  /** Reset the sequence as if freshly constructed with `seed`. */
  seed(seed: number): void {
    this.state = checkedSeed(seed);
  }

  /** Next unsigned 32-bit integer in [0, 2^32) */
  nextUint32(): number {
    this.state = (this.state + 0x6D2B79F5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return (t ^ (t >>> 14)) >>> 0;
  }

  /**
   * Uniform integer in [1, bound] for 1 <= bound <= 2^32 - 1.
   * Rejection sampling keeps every value equally likely.
   */
  nextInRange(bound: number): number {
    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    let u = this.nextUint32();
    while (u >= limit) u = this.nextUint32();
    return 1 + (u % bound);
  }
}
