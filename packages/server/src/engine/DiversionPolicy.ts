import type { AircraftState, ClosureWindow, DiversionReason, HorizonPolicy } from '@aep-sim/shared';
import type { FlightQueue } from './FlightQueue.js';
import type { Kinematics } from './Kinematics.js';
import { isActive, markDiverted } from './aircraftState.js';
import { isClosurePending } from './closure.js';

export interface DiversionParams {
  maxDelayMinutes: number;
  horizonMinutes: number;
  horizonPolicy: HorizonPolicy;
  initialDistanceNm: number;
  divertOnRadarExit: boolean;
  divertPastDayEnd: boolean;
}

/**
 * DiversionPolicy sends aircraft to the alternate airport when they have
 * waited too long, when a closure leaves them no landing slot inside the
 * delay bound, or (optionally) when they back out of radar range, cannot
 * land before the day ends, or are still airborne when the horizon ends.
 */
export class DiversionPolicy {
  constructor(
    private kinematics: Kinematics,
    private params: DiversionParams,
    private closure: ClosureWindow | null
  ) {}

  /** Divert every queued aircraft that meets a rule this minute */
  evaluate(queue: FlightQueue, minute: number): AircraftState[] {
    const diverted: AircraftState[] = [];
    for (const ac of queue.getAll()) {
      if (!isActive(ac)) continue;
      const reason = this.diversionReason(ac, minute);
      if (reason !== null && markDiverted(ac, minute, reason)) {
        diverted.push(ac);
      }
    }
    return diverted;
  }

  /**
   * Reversing aircraft that have backed out past the radar boundary. Runs
   * right after motion, before any aircraft may rejoin the approach.
   */
  evaluateRadarExits(queue: FlightQueue, minute: number): AircraftState[] {
    if (!this.params.divertOnRadarExit) return [];

    const diverted: AircraftState[] = [];
    for (const ac of queue.reversing()) {
      if (ac.position > this.params.initialDistanceNm && markDiverted(ac, minute, 'radarExit')) {
        diverted.push(ac);
      }
    }
    return diverted;
  }

  /** First rule that applies, or null */
  diversionReason(ac: AircraftState, minute: number): DiversionReason | null {
    const { maxDelayMinutes } = this.params;

    if (minute - ac.appearanceMinute > maxDelayMinutes) {
      return 'delay';
    }

    if (this.closure && isClosurePending(this.closure, minute)) {
      const eta = minute + this.kinematics.expectedTimeToLand(ac.position);
      const landsInside = eta >= this.closure.startMinute && eta < this.closure.endMinute;
      // Earliest slot is the end of the closure
      if (landsInside && this.closure.endMinute - ac.appearanceMinute > maxDelayMinutes) {
        return 'closure';
      }
    }

    // Last landing slot is minute horizon − 1
    if (
      this.params.divertPastDayEnd &&
      minute + this.kinematics.expectedTimeToLand(ac.position) >= this.params.horizonMinutes
    ) {
      return 'dayEnd';
    }

    if (this.params.horizonPolicy === 'divert' && minute === this.params.horizonMinutes - 1) {
      return 'horizon';
    }

    return null;
  }
}
