/**
 * Simulator library: testable logic behind the CLI entry point.
 */
import { readFileSync } from 'node:fs';

import { WeightedRandomGenerator } from '../src/core/weighted-generator.js';
import { parseSimulationConfig } from '../src/core/simulation-config.js';
import type { SimulationConfig } from '../src/core/simulation-config.js';

export interface ReportRow {
  element: string;
  weight: number;
  /** weight / totalWeight, 0 when the total is 0 */
  expected: number;
  count: number;
  /** count / draws, 0 when no draws were made */
  observed: number;
}

export interface SimulationReport {
  seed: number;
  draws: number;
  totalWeight: number;
  rows: ReportRow[];
}

export function loadSimulationConfig(path: string): SimulationConfig {
  return parseSimulationConfig(JSON.parse(readFileSync(path, 'utf-8')));
}

export function buildGenerator(config: SimulationConfig): WeightedRandomGenerator<string> {
  const gen = new WeightedRandomGenerator<string>(config.seed);
  for (const { element, weight } of config.weights) {
    if (!gen.insert(element, weight)) {
      throw new Error(`Duplicate element "${element}"`);
    }
  }
  gen.refresh();
  return gen;
}

/** Draw `config.draws` times and tally each element against its expected share. */
export function runSimulation(config: SimulationConfig): SimulationReport {
  const gen = buildGenerator(config);
  const counts = new Map<string, number>();
  for (const element of gen.sample(config.draws)) {
    counts.set(element, (counts.get(element) ?? 0) + 1);
  }

  const rows: ReportRow[] = [];
  for (const { element, weight } of gen) {
    const count = counts.get(element) ?? 0;
    rows.push({
      element,
      weight,
      expected: gen.probability(element) ?? 0,
      count,
      observed: config.draws > 0 ? count / config.draws : 0,
    });
  }

  return { seed: config.seed, draws: config.draws, totalWeight: gen.totalWeight, rows };
}

/** One aligned line per element */
export function formatReport(report: SimulationReport): string[] {
  const width = Math.max(7, ...report.rows.map(r => r.element.length));
  const lines = [
    `${'element'.padEnd(width)}  ${'weight'.padStart(10)}  expected  observed  count`,
  ];
  for (const r of report.rows) {
    lines.push(
      `${r.element.padEnd(width)}  ${String(r.weight).padStart(10)}  ` +
      `${r.expected.toFixed(4).padStart(8)}  ${r.observed.toFixed(4).padStart(8)}  ${r.count}`,
    );
  }
  return lines;
}

/** Elements that are members but can never be drawn */
export function zeroWeightElements(config: SimulationConfig): string[] {
  return config.weights.filter(w => w.weight === 0).map(w => w.element);
}
