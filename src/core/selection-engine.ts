import { SeededRandom } from './seeded-random.js';
import type { CumulativeIndex } from './cumulative-index.js';

/** Draws uniform integers in [1, bound] and resolves them through an index. */
export class SelectionEngine {
  private rng: SeededRandom;
  private bound_ = 0;

  constructor(seed: number) {
    this.rng = new SeededRandom(seed);
  }

  seed(seed: number): void {
    this.rng.seed(seed);
  }

  /** Upper end of the distribution, 0 when nothing can be drawn */
  get bound(): number {
    return this.bound_;
  }

  setBound(bound: number): void {
    this.bound_ = bound;
  }

  /** One draw, or undefined when the bound is 0. */
  draw<E>(index: CumulativeIndex<E>): E | undefined {
    return this.bound_ === 0 ? undefined : this.pick(index);
  }

  /** One draw against a non-zero bound; throws IndexInvariantError otherwise. */
  pick<E>(index: CumulativeIndex<E>): E {
    return index.resolve(this.rng.nextInRange(this.bound_));
  }
}
