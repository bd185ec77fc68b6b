import { isValidSeed } from './seeded-random.js';
import { isValidWeight, MAX_WEIGHT } from './weighted-store.js';

export const DEFAULT_SEED = 1;
export const DEFAULT_DRAWS = 10_000;

/**
 * Simulator input. On disk:
 * `{ "seed": 42, "draws": 100000, "weights": { "A": 1, "B": 3 } }`
 * with seed and draws optional.
 */
export interface SimulationConfig {
  seed: number;
  draws: number;
  weights: Array<{ element: string; weight: number }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfig(json: unknown): { config: SimulationConfig; errors: string[] } {
  const errors: string[] = [];
  const config: SimulationConfig = { seed: DEFAULT_SEED, draws: DEFAULT_DRAWS, weights: [] };

  if (!isRecord(json)) {
    errors.push('Config must be a JSON object');
    return { config, errors };
  }

  if (json.seed !== undefined) {
    if (typeof json.seed === 'number' && isValidSeed(json.seed)) config.seed = json.seed;
    else errors.push(`Invalid seed: ${String(json.seed)}`);
  }
  if (json.draws !== undefined) {
    if (typeof json.draws === 'number' && Number.isSafeInteger(json.draws) && json.draws >= 0) {
      config.draws = json.draws;
    } else {
      errors.push(`Invalid draws: ${String(json.draws)}`);
    }
  }

  if (!isRecord(json.weights)) {
    errors.push('Missing or invalid weights object');
    return { config, errors };
  }

  let total = 0;
  for (const [element, weight] of Object.entries(json.weights)) {
    if (typeof weight !== 'number' || !isValidWeight(weight)) {
      errors.push(`weights.${element}: must be an integer in [0, ${MAX_WEIGHT}], got ${String(weight)}`);
      continue;
    }
    total += weight;
    config.weights.push({ element, weight });
  }
  if (total > MAX_WEIGHT) {
    errors.push(`Total weight ${total} exceeds ${MAX_WEIGHT}`);
  }

  return { config, errors };
}

/** Validate config structure. Returns array of error strings (empty = valid). */
export function validateSimulationConfig(json: unknown): string[] {
  return readConfig(json).errors;
}

/** Validate and apply defaults. Throws with every validation error listed. */
export function parseSimulationConfig(json: unknown): SimulationConfig {
  const { config, errors } = readConfig(json);
  if (errors.length > 0) {
    throw new Error(`Invalid simulation config:\n  ${errors.join('\n  ')}`);
  }
  return config;
}
