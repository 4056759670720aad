/**
 * Batch runner: runs a scenario over consecutive seeds and prints the
 * per-run outcome and the averaged statistics.
 *
 *   tsx scripts/run-batch.ts --scenario storm --runs 20 --seed 100
 *   tsx scripts/run-batch.ts --scenario baseline --trace 1
 */

import { resolveConfig } from '@aep-sim/shared';
import { ScenarioLoader } from '../packages/server/src/data/ScenarioLoader.js';
import { runSimulation } from '../packages/server/src/engine/SimulationEngine.js';
import { InvalidConfigurationError } from '../packages/server/src/engine/errors.js';
import { computeMetrics, runBatch } from '../packages/server/src/metrics/MetricsReducer.js';
import { formatRunSummary, formatTrajectory } from '../packages/server/src/report/TrajectoryReport.js';
import { expectedArrivals } from '../packages/server/src/traffic/ArrivalGenerator.js';

// ─── Arguments ───────────────────────────────────────────────────────────────
function readFlag(name: string): string | undefined {
  const idx = process.argv.indexOf(`--${name}`);
  return idx !== -1 ? process.argv[idx + 1] : undefined;
}

function readInt(name: string, fallback: number): number {
  const raw = readFlag(name);
  if (raw === undefined) return fallback;
  const n = parseInt(raw, 10);
  if (!Number.isInteger(n)) {
    throw new InvalidConfigurationError([`--${name} must be an integer (got "${raw}")`]);
  }
  return n;
}

function main(): void {
  const scenario = readFlag('scenario') ?? 'baseline';
  const loader = new ScenarioLoader();
  const overrides = loader.load(scenario);
  const base = resolveConfig(overrides);
  const config = resolveConfig({ ...overrides, seed: readInt('seed', base.seed) });
  const runs = readInt('runs', 10);
  const trace = readFlag('trace');

  console.log(`=== AEP arrivals: ${scenario} ===`);
  console.log(
    `rate ${config.arrivalRatePerMinute}/min over ${config.horizonMinutes} min ` +
    `(~${expectedArrivals(config.arrivalRatePerMinute, config.horizonMinutes).toFixed(1)} aircraft/run), ` +
    `${runs} runs from seed ${config.seed}`
  );

  if (trace !== undefined) {
    const result = runSimulation(config);
    const record = result.aircraft.find(a => a.id === parseInt(trace, 10));
    console.log(formatRunSummary(result, computeMetrics(result)));
    console.log(record ? formatTrajectory(record) : `No aircraft ${trace} in seed ${config.seed}`);
    return;
  }

  const batch = runBatch(config, runs);
  batch.perRun.forEach((m, i) => {
    console.log(
      `  seed ${batch.seeds[i]}: ${m.aircraftCount} aircraft, ${m.landedCount} landed, ` +
      `${m.divertedCount} diverted, avg delay ${m.averageDelay.toFixed(2)} min`
    );
  });

  const mean = batch.mean;
  console.log('='.repeat(70));
  console.log(`Average delay:         ${mean.averageDelay.toFixed(2)} min`);
  console.log(`Diversion probability: ${mean.diversionProbability.toFixed(4)}`);
  console.log(`Congestion frequency:  ${mean.congestionFrequency.toFixed(4)}`);
  console.log(`Reversal frequency:    ${mean.reversalFrequency.toFixed(4)}`);
  console.log(`Airborne at horizon:   ${mean.airborneAtHorizon.toFixed(2)}`);
  console.log('='.repeat(70));
}

try {
  main();
} catch (err) {
  if (err instanceof InvalidConfigurationError) {
    console.error(`[Batch] ${err.message}`);
    process.exit(1);
  }
  console.error('[Batch] Fatal error:', err);
  process.exit(2);
}
