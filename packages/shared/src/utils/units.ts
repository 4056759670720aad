/** Convert knots to nautical miles per minute */
export function knotsToNmPerMinute(knots: number): number {
  return knots / 60;
}

/** Distance covered in the given minutes at a speed in knots */
export function distanceNm(knots: number, minutes: number): number {
  return knotsToNmPerMinute(knots) * minutes;
}

/** Minutes needed to cover a distance at a speed in knots */
export function minutesToCover(distance: number, knots: number): number {
  if (knots <= 0) return Infinity;
  return distance / knotsToNmPerMinute(knots);
}

/** Operating day at AEP starts at 06:00 local */
export const DAY_START_MINUTES = 6 * 60;

/**
 * Format a simulation minute as wall-clock time
 * e.g., 0 → "06:00", 125 → "08:05", 1080 → "24:00"
 */
export function formatSimTime(minute: number, dayStart: number = DAY_START_MINUTES): string {
  const total = dayStart + Math.floor(minute);
  const hours = Math.floor(total / 60);
  const mins = total % 60;
  return `${String(hours).padStart(2, '0')}:${String(mins).padStart(2, '0')}`;
}
