#!/usr/bin/env tsx
/**
 * Weighted draw simulator
 *
 * Runs N draws over the weights in a JSON config and compares observed
 * frequencies with expected probabilities.
 *
 * Usage: npm run simulate -- [config.json]
 */
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { formatReport, loadSimulationConfig, runSimulation, zeroWeightElements } from './simulate-lib.js';

const PROJECT_ROOT = resolve(fileURLToPath(new URL('.', import.meta.url)), '..');
const DEFAULT_CONFIG = resolve(PROJECT_ROOT, 'assets', 'simulation.json');

function main(): void {
  const configPath = process.argv[2] ? resolve(process.argv[2]) : DEFAULT_CONFIG;
  const config = loadSimulationConfig(configPath);
  console.log(`[simulate] Loaded ${config.weights.length} element(s) from ${configPath}`);

  for (const element of zeroWeightElements(config)) {
    console.warn(`[simulate] WARNING: "${element}" has weight 0 and will never be drawn`);
  }

  const report = runSimulation(config);
  if (report.totalWeight === 0) {
    console.warn('[simulate] Total weight is 0, nothing to draw');
  }

  console.log(`[simulate] ${report.draws} draw(s), seed ${report.seed}, total weight ${report.totalWeight}\n`);
  for (const line of formatReport(report)) console.log(line);
}

try {
  main();
} catch (err) {
  console.error('[simulate] Failed:', err);
  process.exit(1);
}
