import type {
  AircraftRecord,
  CreateRunRequest,
  ReplayFrame,
  RunSummary,
  SimulationResult,
} from '@aep-sim/shared';
import { resolveConfig } from '@aep-sim/shared';
import { v4 as uuid } from 'uuid';
import { runSimulation } from '../engine/SimulationEngine.js';
import { computeMetrics } from '../metrics/MetricsReducer.js';
import { ScenarioLoader } from '../data/ScenarioLoader.js';
import { InvalidConfigurationError } from '../engine/errors.js';

/** Finished runs kept in memory; the oldest is dropped beyond this */
export const DEFAULT_MAX_RUNS = 50;

interface StoredRun {
  summary: RunSummary;
  result: SimulationResult;
}

/** Request bodies arrive as parsed JSON */
function requestIssues(request: CreateRunRequest): string[] {
  const issues: string[] = [];
  const scenario: unknown = request.scenario;
  if (scenario !== undefined && typeof scenario !== 'string') {
    issues.push('scenario must be a string');
  }
  const config: unknown = request.config;
  if (config !== undefined && (typeof config !== 'object' || config === null || Array.isArray(config))) {
    issues.push('config must be an object');
  }
  return issues;
}

/**
 * RunManager executes simulations on request and keeps the finished records
 * in memory for the API and the replay channel.
 */
export class RunManager {
  private runs = new Map<string, StoredRun>();

  constructor(
    private scenarios: ScenarioLoader = new ScenarioLoader(),
    private maxRuns: number = DEFAULT_MAX_RUNS
  ) {}

  /** Resolve scenario + overrides, run to completion, store */
  createRun(request: CreateRunRequest = {}): RunSummary {
    const issues = requestIssues(request);
    if (issues.length > 0) {
      throw new InvalidConfigurationError(issues);
    }
    const base = request.scenario ? this.scenarios.load(request.scenario) : {};
    const config = resolveConfig({ ...base, ...request.config });
    const result = runSimulation(config);

    const summary: RunSummary = {
      id: uuid(),
      scenario: request.scenario ?? null,
      createdAt: Date.now(),
      seed: config.seed,
      horizonMinutes: config.horizonMinutes,
      metrics: computeMetrics(result),
    };

    this.runs.set(summary.id, { summary, result });
    this.evictOldest();
    console.log(
      `[RunManager] Run ${summary.id}: ${summary.metrics.aircraftCount} aircraft, ` +
      `${summary.metrics.landedCount} landed, ${summary.metrics.divertedCount} diverted`
    );
    return summary;
  }

  getSummary(id: string): RunSummary | null {
    return this.runs.get(id)?.summary ?? null;
  }

  getResult(id: string): SimulationResult | null {
    return this.runs.get(id)?.result ?? null;
  }

  getAircraft(id: string, aircraftId: number): AircraftRecord | null {
    return this.runs.get(id)?.result.aircraft.find(a => a.id === aircraftId) ?? null;
  }

  listSummaries(): RunSummary[] {
    return Array.from(this.runs.values(), r => r.summary);
  }

  /**
   * Minute frames of a finished run, optionally limited to an inclusive range.
   * Returns null for an unknown run.
   */
  getReplayFrames(id: string, fromMinute?: number, toMinute?: number): ReplayFrame[] | null {
    const run = this.runs.get(id);
    if (!run) return null;

    const first = fromMinute ?? 0;
    const last = toMinute ?? run.result.config.horizonMinutes - 1;

    const byMinute = new Map<number, ReplayFrame['aircraft']>();
    for (const ac of run.result.aircraft) {
      for (const snap of ac.history) {
        if (snap.minute < first || snap.minute > last) continue;
        const rows = byMinute.get(snap.minute) ?? [];
        rows.push({ id: ac.id, ...snap });
        byMinute.set(snap.minute, rows);
      }
    }

    return run.result.minutes
      .filter(m => m.minute >= first && m.minute <= last)
      .map(counts => ({
        minute: counts.minute,
        counts,
        aircraft: byMinute.get(counts.minute) ?? [],
      }));
  }

  removeRun(id: string): boolean {
    return this.runs.delete(id);
  }

  /** Maps iterate in insertion order, so the first key is the oldest run */
  private evictOldest(): void {
    for (const id of this.runs.keys()) {
      if (this.runs.size <= this.maxRuns) break;
      this.runs.delete(id);
      console.log(`[RunManager] Evicted run ${id} (limit ${this.maxRuns})`);
    }
  }

  get count(): number {
    return this.runs.size;
  }
}
