import type { AircraftState } from '@aep-sim/shared';
import type { FlightQueue } from './FlightQueue.js';
import type { Kinematics } from './Kinematics.js';
import type { RandomSource } from '../traffic/random.js';
import { markLanded, reinsert, startReversal } from './aircraftState.js';

export interface SeparationParams {
  minSeparationMinutes: number;
  reinsertionBufferMinutes: number;
  landingGapMinutes: number;
  windAbortProbability: number;
  windAbortWithinMinutes: number | null;
}

/** What the policy changed in one minute */
export interface SeparationOutcome {
  landed: AircraftState | null;
  /** Leader on the runway that could not land this minute */
  held: AircraftState | null;
  reversed: AircraftState[];
  reinserted: AircraftState[];
  congestionEvents: number;
}

/**
 * SeparationPolicy decides, each minute, which aircraft lands, which must
 * reverse to restore spacing and which reversing aircraft may rejoin.
 * Holds the run's last landing minute.
 */
export class SeparationPolicy {
  private lastLandingMinute: number | null = null;

  constructor(
    private kinematics: Kinematics,
    private params: SeparationParams
  ) {}

  get lastLanding(): number | null {
    return this.lastLandingMinute;
  }

  reset(): void {
    this.lastLandingMinute = null;
  }

  /**
   * Independent go-around trial for every in-flight aircraft, in queue order.
   * Draws nothing when wind is disabled, so the random sequence is unchanged.
   */
  applyWindAborts(queue: FlightQueue, minute: number, random: RandomSource): AircraftState[] {
    const p = this.params.windAbortProbability;
    if (p <= 0) return [];

    const aborted: AircraftState[] = [];
    const within = this.params.windAbortWithinMinutes;
    for (const ac of queue.inFlight()) {
      if (within !== null && this.kinematics.expectedTimeToLand(ac.position) > within) continue;
      if (random() < p) {
        startReversal(ac, minute, 'wind', this.kinematics.reversalVelocity);
        aborted.push(ac);
      }
    }
    return aborted;
  }

  /** True when the landing gap since the last landing has elapsed */
  gapSatisfied(minute: number): boolean {
    return this.lastLandingMinute === null
      || minute - this.lastLandingMinute >= this.params.landingGapMinutes;
  }

  /** Landing, separation and reinsertion for one minute. Queue must be sorted. */
  enforce(queue: FlightQueue, minute: number, runwayClosed: boolean): SeparationOutcome {
    const outcome: SeparationOutcome = {
      landed: null,
      held: null,
      reversed: [],
      reinserted: [],
      congestionEvents: 0,
    };

    // 1. Only the leader may land, and only onto an open runway after the gap
    const leader = queue.leader();
    if (leader && leader.position <= 0) {
      if (!runwayClosed && this.gapSatisfied(minute)) {
        markLanded(leader, minute);
        this.lastLandingMinute = minute;
        outcome.landed = leader;
      } else if (leader.phase.kind === 'inFlight') {
        leader.phase.velocity = 0;
        outcome.held = leader;
      }
    }

    // 2. Every follower against the closest aircraft still flying ahead of it
    let ahead: AircraftState | null = null;
    for (const ac of queue.inFlight()) {
      if (ahead === null) {
        ac.gapAheadMinutes = null;
        ahead = ac;
        continue;
      }
      const gap = this.kinematics.separationMinutes(ahead.position, ac.position);
      ac.gapAheadMinutes = gap;
      if (gap < this.params.minSeparationMinutes) {
        ac.congestionEvents++;
        outcome.congestionEvents++;
        startReversal(ac, minute, 'separation', this.kinematics.reversalVelocity);
        outcome.reversed.push(ac);
      } else {
        ahead = ac;
      }
    }

    // 3. Reversing aircraft rejoin once both neighbours are a buffer away
    for (const ac of queue.reversing()) {
      if (ac.phase.kind !== 'reversing' || ac.phase.since >= minute) continue;
      if (this.tryReinsert(queue, ac)) {
        outcome.reinserted.push(ac);
      }
    }
    if (outcome.reinserted.length > 0) {
      queue.sort();
    }

    return outcome;
  }

  private tryReinsert(queue: FlightQueue, ac: AircraftState): boolean {
    let ahead: AircraftState | null = null;
    let behind: AircraftState | null = null;
    for (const other of queue.inFlight()) {
      if (other.position <= ac.position) {
        ahead = other;
      } else {
        behind = other;
        break;
      }
    }

    const buffer = this.params.reinsertionBufferMinutes;
    const gapAhead = ahead ? this.kinematics.separationMinutes(ahead.position, ac.position) : null;
    const gapBehind = behind ? this.kinematics.separationMinutes(ac.position, behind.position) : null;
    ac.gapAheadMinutes = gapAhead;

    if ((gapAhead !== null && gapAhead < buffer) || (gapBehind !== null && gapBehind < buffer)) {
      return false;
    }
    return reinsert(ac, this.kinematics.approachSpeed(ac.position));
  }
}
