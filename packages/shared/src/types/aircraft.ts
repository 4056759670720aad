/** Why an aircraft started flying away from the runway */
export type ReversalCause = 'separation' | 'wind';

/** Why an aircraft was sent to the alternate airport */
export type DiversionReason = 'delay' | 'closure' | 'dayEnd' | 'radarExit' | 'horizon';

/** Approaching the runway at a non-negative speed (knots) */
export interface InFlightPhase {
  kind: 'inFlight';
  velocity: number;
}

/** Flying away from the runway ("marcha atrás") */
export interface ReversingPhase {
  kind: 'reversing';
  /** Always the negated reversal speed (knots) */
  velocity: number;
  /** Minute the reversal started */
  since: number;
  cause: ReversalCause;
}

export interface LandedPhase {
  kind: 'landed';
  landingMinute: number;
}

export interface DivertedPhase {
  kind: 'diverted';
  diversionMinute: number;
  reason: DiversionReason;
}

/** Aircraft state machine. Landed and diverted are absorbing. */
export type AircraftPhase = InFlightPhase | ReversingPhase | LandedPhase | DivertedPhase;

export type AircraftStatus = AircraftPhase['kind'];

/** Phases that still occupy a slot in the flight queue */
export type ActivePhase = InFlightPhase | ReversingPhase;

/** One row of an aircraft's trajectory */
export interface AircraftSnapshot {
  minute: number;
  /** Distance to the runway threshold (nm) */
  position: number;
  /** Signed speed (knots), 0 once terminal or while held at the runway */
  velocity: number;
  status: AircraftStatus;
  /** Time separation to the aircraft ahead (minutes), null for the leader */
  gapAheadMinutes: number | null;
}

/** Mutable per-run aircraft record */
export interface AircraftState {
  /** Sequential id, 1-based in appearance order */
  id: number;
  /** Minute the aircraft enters radar range */
  readonly appearanceMinute: number;
  /** Distance to the runway threshold (nm) */
  position: number;
  phase: AircraftPhase;
  everReversed: boolean;
  reversalCount: number;
  /** Minutes in which the aircraft was found below minimum separation */
  congestionEvents: number;
  gapAheadMinutes: number | null;
  history: AircraftSnapshot[];
}
