import type { AircraftSnapshot } from './aircraft.js';
import type { SimulationConfigOverrides } from './config.js';
import type { MinuteSnapshot, RunMetrics } from './results.js';

/** Registry entry returned by the API */
export interface RunSummary {
  id: string;
  scenario: string | null;
  createdAt: number;
  seed: number;
  horizonMinutes: number;
  metrics: RunMetrics;
}

/** Body of POST /api/runs */
export interface CreateRunRequest {
  scenario?: string;
  config?: SimulationConfigOverrides;
}

/** One minute of a recorded run */
export interface ReplayFrame {
  minute: number;
  counts: MinuteSnapshot;
  aircraft: Array<AircraftSnapshot & { id: number }>;
}

/** ===== Server → Client Messages ===== */

export interface FrameMessage {
  type: 'frame';
  runId: string;
  frame: ReplayFrame;
}

export interface ReplayEndMessage {
  type: 'replayEnd';
  runId: string;
  frames: number;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
  code?: string;
}

export type ServerMessage = FrameMessage | ReplayEndMessage | ErrorMessage;

/** ===== Client → Server Messages ===== */

export interface ReplayMessage {
  type: 'replay';
  runId: string;
  /** Optional inclusive minute range */
  fromMinute?: number;
  toMinute?: number;
}

export type ClientMessage = ReplayMessage;
