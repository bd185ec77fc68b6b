export { WeightedRandomGenerator } from './core/weighted-generator.js';
export type { GeneratorOptions, GeneratorOptionArgs } from './core/weighted-generator.js';
export { WeightedStore, MAX_WEIGHT, InvalidWeightError, WeightOverflowError, isValidWeight } from './core/weighted-store.js';
export type { WeightedEntry } from './core/weighted-store.js';
export { CumulativeIndex, IndexInvariantError } from './core/cumulative-index.js';
export type { CumulativeRange } from './core/cumulative-index.js';
export { SelectionEngine } from './core/selection-engine.js';
export { SeededRandom, InvalidSeedError, isValidSeed } from './core/seeded-random.js';
export { naturalOrder, lowerBound } from './core/comparator.js';
export type { Comparator, NaturallyOrdered } from './core/comparator.js';
export {
  parseSimulationConfig,
  validateSimulationConfig,
  DEFAULT_SEED,
  DEFAULT_DRAWS,
} from './core/simulation-config.js';
export type { SimulationConfig } from './core/simulation-config.js';
