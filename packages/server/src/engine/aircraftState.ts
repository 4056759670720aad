import type {
  AircraftRecord,
  AircraftSnapshot,
  AircraftState,
  DiversionReason,
  ReversalCause,
} from '@aep-sim/shared';

/** Create an aircraft entering radar range, approaching at the given speed */
export function createAircraft(
  id: number,
  appearanceMinute: number,
  initialDistanceNm: number,
  approachSpeedKnots: number
): AircraftState {
  return {
    id,
    appearanceMinute,
    position: initialDistanceNm,
    phase: { kind: 'inFlight', velocity: approachSpeedKnots },
    everReversed: false,
    reversalCount: 0,
    congestionEvents: 0,
    gapAheadMinutes: null,
    history: [],
  };
}

export function isActive(ac: AircraftState): boolean {
  return ac.phase.kind === 'inFlight' || ac.phase.kind === 'reversing';
}

/** Start flying away from the runway. No-op unless the aircraft is in flight. */
export function startReversal(
  ac: AircraftState,
  minute: number,
  cause: ReversalCause,
  reversalVelocity: number
): boolean {
  if (ac.phase.kind !== 'inFlight') return false;
  ac.phase = { kind: 'reversing', velocity: reversalVelocity, since: minute, cause };
  ac.everReversed = true;
  ac.reversalCount++;
  return true;
}

/** Rejoin the approach at the given speed. No-op unless reversing. */
export function reinsert(ac: AircraftState, approachSpeedKnots: number): boolean {
  if (ac.phase.kind !== 'reversing') return false;
  ac.phase = { kind: 'inFlight', velocity: approachSpeedKnots };
  return true;
}

export function markLanded(ac: AircraftState, minute: number): boolean {
  if (!isActive(ac)) return false;
  ac.position = 0;
  ac.phase = { kind: 'landed', landingMinute: minute };
  ac.gapAheadMinutes = null;
  return true;
}

export function markDiverted(ac: AircraftState, minute: number, reason: DiversionReason): boolean {
  if (!isActive(ac)) return false;
  ac.phase = { kind: 'diverted', diversionMinute: minute, reason };
  ac.gapAheadMinutes = null;
  return true;
}

function currentVelocity(ac: AircraftState): number {
  switch (ac.phase.kind) {
    case 'inFlight':
    case 'reversing':
      return ac.phase.velocity;
    case 'landed':
    case 'diverted':
      return 0;
  }
}

/** Append this minute's row to the aircraft's trajectory */
export function recordSnapshot(ac: AircraftState, minute: number): AircraftSnapshot {
  const snapshot: AircraftSnapshot = {
    minute,
    position: ac.position,
    velocity: currentVelocity(ac),
    status: ac.phase.kind,
    gapAheadMinutes: ac.gapAheadMinutes,
  };
  ac.history.push(snapshot);
  return snapshot;
}

/** Detach an immutable record from the run */
export function toRecord(ac: AircraftState): AircraftRecord {
  const phase = ac.phase;
  return {
    id: ac.id,
    appearanceMinute: ac.appearanceMinute,
    finalPhase: { ...phase },
    status: phase.kind,
    landingMinute: phase.kind === 'landed' ? phase.landingMinute : null,
    diversionMinute: phase.kind === 'diverted' ? phase.diversionMinute : null,
    everReversed: ac.everReversed,
    reversalCount: ac.reversalCount,
    congestionEvents: ac.congestionEvents,
    history: ac.history.map(s => ({ ...s })),
  };
}
