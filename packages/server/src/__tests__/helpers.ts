import type { AircraftState, SimulationConfigOverrides } from '@aep-sim/shared';
import { resolveConfig } from '@aep-sim/shared';
import { createAircraft, startReversal } from '../engine/aircraftState.js';
import { Kinematics } from '../engine/Kinematics.js';

/** Defaults plus overrides, invariant checks on */
export function testConfig(overrides: SimulationConfigOverrides = {}) {
  return resolveConfig({ checkInvariants: true, ...overrides });
}

export function defaultKinematics(): Kinematics {
  return new Kinematics(resolveConfig());
}

/** In-flight aircraft at a position, appeared at minute 0 */
export function flying(id: number, position: number, appearanceMinute = 0): AircraftState {
  const ac = createAircraft(id, appearanceMinute, 100, 300);
  ac.position = position;
  return ac;
}

/** Reversing aircraft that started reversing at `since` */
export function reversing(id: number, position: number, since: number): AircraftState {
  const ac = flying(id, position);
  startReversal(ac, since, 'separation', -200);
  return ac;
}

/** Random source that counts how often it was called */
export function countingRandom(value: number): { random: () => number; calls: () => number } {
  let calls = 0;
  return {
    random: () => {
      calls++;
      return value;
    },
    calls: () => calls,
  };
}
