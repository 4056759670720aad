import type { ClosureConfig, ClosureWindow } from '@aep-sim/shared';
import type { RandomSource } from '../traffic/random.js';

/** True when landings are suspended at this minute */
export function isRunwayClosed(window: ClosureWindow | null, minute: number): boolean {
  return window !== null && minute >= window.startMinute && minute < window.endMinute;
}

/** True when the window has not ended yet at this minute */
export function isClosurePending(window: ClosureWindow | null, minute: number): boolean {
  return window !== null && minute < window.endMinute;
}

/**
 * Turn the configured closure into concrete bounds. A random window is placed
 * uniformly so that it fits entirely inside the horizon; it takes exactly one
 * draw from the run's generator.
 */
export function resolveClosureWindow(
  closure: ClosureConfig | null,
  horizonMinutes: number,
  random: RandomSource
): ClosureWindow | null {
  if (closure === null) return null;
  if (closure.kind === 'fixed') {
    return { startMinute: closure.startMinute, endMinute: closure.endMinute };
  }
  const latestStart = horizonMinutes - closure.durationMinutes;
  const startMinute = Math.floor(random() * (latestStart + 1));
  return { startMinute, endMinute: startMinute + closure.durationMinutes };
}
