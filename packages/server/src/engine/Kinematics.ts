import type { AircraftState, SpeedBand } from '@aep-sim/shared';
import { distanceNm, minutesToCover } from '@aep-sim/shared';

/** Positions this close to the threshold count as on the runway */
export const POSITION_EPSILON_NM = 1e-9;

/** Upper bound for ETA stepping; bands are validated positive so this is never hit in practice */
const MAX_ETA_STEPS = 100000;

export interface PermittedSpeed {
  maxKnots: number;
  minKnots: number;
}

export interface KinematicsParams {
  speedBands: SpeedBand[];
  reversalSpeedKnots: number;
  timeStepMinutes: number;
}

/**
 * Kinematics handles per-minute motion along the approach.
 * Positions are nm to the threshold; every speed comes from the band table.
 */
export class Kinematics {
  private bands: SpeedBand[];
  private reversalSpeedKnots: number;
  private dt: number;

  constructor(params: KinematicsParams) {
    this.bands = params.speedBands;
    this.reversalSpeedKnots = params.reversalSpeedKnots;
    this.dt = params.timeStepMinutes;
  }

  /** Allowed speed band for a distance to the runway */
  permittedSpeed(position: number): PermittedSpeed {
    const band = this.bands.find(b => position > b.aboveNm) ?? this.bands[this.bands.length - 1];
    return { maxKnots: band.maxKnots, minKnots: band.minKnots };
  }

  /** Position after one step toward the runway at the given speed */
  stepToward(position: number, knots: number): number {
    const next = position - distanceNm(knots, this.dt);
    return next <= POSITION_EPSILON_NM ? 0 : next;
  }

  /**
   * Whole engine minutes to reach the runway from a position, always at the
   * band maximum.
   */
  expectedTimeToLand(position: number): number {
    let d = position;
    let minutes = 0;
    while (d > 0) {
      if (minutes >= MAX_ETA_STEPS) return Infinity;
      d = this.stepToward(d, this.permittedSpeed(d).maxKnots);
      minutes++;
    }
    return minutes;
  }

  /**
   * Time separation between two aircraft in minutes: the gap flown at the
   * leader's maximum permitted speed.
   */
  separationMinutes(leaderPosition: number, followerPosition: number): number {
    const gap = followerPosition - leaderPosition;
    return minutesToCover(gap, this.permittedSpeed(leaderPosition).maxKnots);
  }

  /**
   * Move one aircraft one step. Mutates the aircraft in place.
   * While the runway is closed, approaching aircraft slow to their band minimum.
   */
  advance(ac: AircraftState, runwayClosed: boolean): void {
    const phase = ac.phase;
    switch (phase.kind) {
      case 'inFlight': {
        const speed = this.permittedSpeed(ac.position);
        phase.velocity = runwayClosed ? speed.minKnots : speed.maxKnots;
        ac.position = this.stepToward(ac.position, phase.velocity);
        break;
      }
      case 'reversing':
        phase.velocity = -this.reversalSpeedKnots;
        ac.position += distanceNm(this.reversalSpeedKnots, this.dt);
        break;
      case 'landed':
      case 'diverted':
        // Absorbing states do not move
        break;
    }
  }

  /** Approach speed assigned on entry or reinsertion */
  approachSpeed(position: number): number {
    return this.permittedSpeed(position).maxKnots;
  }

  /** Signed reversal velocity */
  get reversalVelocity(): number {
    return -this.reversalSpeedKnots;
  }
}
