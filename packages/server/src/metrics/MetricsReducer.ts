import type {
  BatchSummary,
  RunMetrics,
  SimulationConfig,
  SimulationResult,
} from '@aep-sim/shared';
import { runSimulation } from '../engine/SimulationEngine.js';

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

/**
 * Reduce one run's record to its statistics.
 *
 * - Average delay is taken over landed aircraft only.
 * - Diversion probability is diverted / (landed + diverted); aircraft still
 *   airborne at the horizon are left out of both.
 * - Congestion and reversal frequencies are shares of every aircraft that
 *   appeared.
 */
export function computeMetrics(result: SimulationResult): RunMetrics {
  const aircraftCount = result.aircraft.length;
  const totalDelay = result.delays.reduce((sum, d) => sum + d.delayMinutes, 0);
  const congested = result.aircraft.filter(a => a.congestionEvents > 0).length;
  const reversed = result.aircraft.filter(a => a.everReversed).length;
  const resolved = result.landedCount + result.divertedCount;

  return {
    aircraftCount,
    landedCount: result.landedCount,
    divertedCount: result.divertedCount,
    airborneAtHorizon: result.airborneCount,
    averageDelay: ratio(totalDelay, result.delays.length),
    diversionProbability: ratio(result.divertedCount, resolved),
    congestionEventCount: result.congestionEventCount,
    congestionFrequency: ratio(congested, aircraftCount),
    reversalFrequency: ratio(reversed, aircraftCount),
  };
}

/** Field-wise mean of several runs */
export function meanMetrics(runs: RunMetrics[]): RunMetrics {
  const n = runs.length;
  const mean = (pick: (m: RunMetrics) => number): number =>
    ratio(runs.reduce((sum, m) => sum + pick(m), 0), n);

  return {
    aircraftCount: mean(m => m.aircraftCount),
    landedCount: mean(m => m.landedCount),
    divertedCount: mean(m => m.divertedCount),
    airborneAtHorizon: mean(m => m.airborneAtHorizon),
    averageDelay: mean(m => m.averageDelay),
    diversionProbability: mean(m => m.diversionProbability),
    congestionEventCount: mean(m => m.congestionEventCount),
    congestionFrequency: mean(m => m.congestionFrequency),
    reversalFrequency: mean(m => m.reversalFrequency),
  };
}

/** Independent runs on consecutive seeds starting at config.seed */
export function runBatch(config: SimulationConfig, runs: number): BatchSummary {
  if (!Number.isInteger(runs) || runs <= 0) {
    throw new RangeError(`runs must be a positive integer (got ${runs})`);
  }

  const seeds: number[] = [];
  const perRun: RunMetrics[] = [];
  for (let i = 0; i < runs; i++) {
    const seed = config.seed + i;
    seeds.push(seed);
    perRun.push(computeMetrics(runSimulation({ ...config, seed })));
  }

  return { runs, seeds, perRun, mean: meanMetrics(perRun) };
}
