import type { RandomSource } from './random.js';

/**
 * Radar appearance minutes over the horizon. Poisson arrivals thinned to at
 * most one aircraft per minute: each minute takes one draw and schedules an
 * arrival when the draw falls below the rate.
 */
export function generateArrivals(
  ratePerMinute: number,
  horizonMinutes: number,
  random: RandomSource
): number[] {
  const arrivals: number[] = [];
  for (let minute = 0; minute < horizonMinutes; minute++) {
    if (random() < ratePerMinute) {
      arrivals.push(minute);
    }
  }
  return arrivals;
}

/** Expected number of arrivals for a rate and horizon */
export function expectedArrivals(ratePerMinute: number, horizonMinutes: number): number {
  return ratePerMinute * horizonMinutes;
}
