import type { AircraftState } from '@aep-sim/shared';
import { InvariantViolationError } from './errors.js';
import { POSITION_EPSILON_NM } from './Kinematics.js';

/** Queue order: closest to the runway first, ties by id */
function compareAircraft(a: AircraftState, b: AircraftState): number {
  return a.position - b.position || a.id - b.id;
}

function isTerminal(ac: AircraftState): boolean {
  return ac.phase.kind === 'landed' || ac.phase.kind === 'diverted';
}

/**
 * FlightQueue holds every aircraft currently in flight or reversing, ordered
 * by distance to the runway.
 */
export class FlightQueue {
  private aircraft: AircraftState[] = [];

  /** Insert keeping order. Binary search, one splice. */
  insert(ac: AircraftState): void {
    let lo = 0;
    let hi = this.aircraft.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareAircraft(this.aircraft[mid], ac) <= 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    this.aircraft.splice(lo, 0, ac);
  }

  /** Re-sort after positions changed */
  sort(): void {
    this.aircraft.sort(compareAircraft);
  }

  /** Remove aircraft by id */
  remove(id: number): boolean {
    const idx = this.aircraft.findIndex(a => a.id === id);
    if (idx === -1) return false;
    this.aircraft.splice(idx, 1);
    return true;
  }

  /** Drop every landed or diverted aircraft. Returns the removed ones. */
  removeTerminal(): AircraftState[] {
    const removed = this.aircraft.filter(isTerminal);
    if (removed.length > 0) {
      this.aircraft = this.aircraft.filter(a => !isTerminal(a));
    }
    return removed;
  }

  /** Snapshot of the queue in order; safe to iterate while the queue changes */
  getAll(): AircraftState[] {
    return this.aircraft.slice();
  }

  getById(id: number): AircraftState | undefined {
    return this.aircraft.find(a => a.id === id);
  }

  /** Closest in-flight aircraft */
  leader(): AircraftState | undefined {
    return this.aircraft.find(a => a.phase.kind === 'inFlight');
  }

  inFlight(): AircraftState[] {
    return this.aircraft.filter(a => a.phase.kind === 'inFlight');
  }

  reversing(): AircraftState[] {
    return this.aircraft.filter(a => a.phase.kind === 'reversing');
  }

  /** Aircraft neither landed nor diverted that have appeared by this minute */
  selectActive(minute: number): AircraftState[] {
    return this.aircraft.filter(a => !isTerminal(a) && a.appearanceMinute <= minute);
  }

  get count(): number {
    return this.aircraft.length;
  }

  /**
   * Diagnostic pass over the queue. Returns one message per problem found;
   * an empty list means the queue is consistent.
   */
  detectInconsistencies(): string[] {
    const problems: string[] = [];
    const seen = new Set<number>();

    for (let i = 0; i < this.aircraft.length; i++) {
      const ac = this.aircraft[i];

      if (seen.has(ac.id)) {
        problems.push(`duplicate aircraft ${ac.id}`);
      }
      seen.add(ac.id);

      if (isTerminal(ac)) {
        problems.push(`aircraft ${ac.id} is ${ac.phase.kind} but still queued`);
      }

      if (i > 0 && compareAircraft(this.aircraft[i - 1], ac) > 0) {
        problems.push(
          `aircraft ${ac.id} at ${ac.position.toFixed(3)}nm queued behind ` +
          `${this.aircraft[i - 1].id} at ${this.aircraft[i - 1].position.toFixed(3)}nm`
        );
      }
    }

    // After enforcement no two in-flight aircraft may share a position
    const flying = this.inFlight();
    for (let i = 1; i < flying.length; i++) {
      const a = flying[i - 1];
      const b = flying[i];
      if (Math.abs(b.position - a.position) <= POSITION_EPSILON_NM) {
        problems.push(`aircraft ${a.id} and ${b.id} in flight at the same position`);
      }
    }

    return problems;
  }

  /** Throw when the diagnostic pass finds anything */
  assertConsistent(minute: number): void {
    const problems = this.detectInconsistencies();
    if (problems.length > 0) {
      throw new InvariantViolationError(minute, problems);
    }
  }
}
