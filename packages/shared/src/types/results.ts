import type { AircraftPhase, AircraftSnapshot, AircraftStatus } from './aircraft.js';
import type { ClosureWindow, SimulationConfig } from './config.js';

/** Counts recorded at the end of every simulated minute */
export interface MinuteSnapshot {
  minute: number;
  inFlight: number;
  reversing: number;
  /** Cumulative */
  landed: number;
  /** Cumulative */
  diverted: number;
  congestionEvents: number;
  landings: number;
}

/** Immutable record of one aircraft after a run */
export interface AircraftRecord {
  id: number;
  appearanceMinute: number;
  finalPhase: AircraftPhase;
  status: AircraftStatus;
  landingMinute: number | null;
  diversionMinute: number | null;
  everReversed: boolean;
  reversalCount: number;
  congestionEvents: number;
  history: AircraftSnapshot[];
}

export interface AircraftDelay {
  id: number;
  /** Minutes later than the unimpeded landing */
  delayMinutes: number;
}

export interface SimulationResult {
  config: SimulationConfig;
  closure: ClosureWindow | null;
  arrivals: number[];
  aircraft: AircraftRecord[];
  minutes: MinuteSnapshot[];
  landedCount: number;
  divertedCount: number;
  /** Still in flight or reversing when the horizon ended */
  airborneCount: number;
  congestionEventCount: number;
  delays: AircraftDelay[];
}

/** Reduction of one run */
export interface RunMetrics {
  aircraftCount: number;
  landedCount: number;
  divertedCount: number;
  airborneAtHorizon: number;
  /** Minutes, over landed aircraft */
  averageDelay: number;
  /** diverted / (landed + diverted) */
  diversionProbability: number;
  congestionEventCount: number;
  /** Share of aircraft with at least one congestion event */
  congestionFrequency: number;
  /** Share of aircraft that reversed at least once */
  reversalFrequency: number;
}

export interface BatchSummary {
  runs: number;
  seeds: number[];
  perRun: RunMetrics[];
  /** Mean of every field across runs */
  mean: RunMetrics;
}
