import type { AircraftRecord, AircraftSnapshot, RunMetrics, SimulationResult } from '@aep-sim/shared';
import { formatSimTime } from '@aep-sim/shared';

const STATUS_LABELS: Record<AircraftSnapshot['status'], string> = {
  inFlight: 'in flight',
  reversing: 'reversing',
  landed: 'landed',
  diverted: 'diverted',
};

const HEADER = ' Min | Time  | Pos(nm) | Vel(kt) | Gap(min) |    Status';

function formatGap(gap: number | null): string {
  return gap === null ? '    None' : gap.toFixed(2).padStart(8);
}

/** One fixed-width row per minute */
export function formatSnapshotRow(s: AircraftSnapshot): string {
  return [
    String(s.minute).padStart(4),
    formatSimTime(s.minute),
    s.position.toFixed(1).padStart(7),
    s.velocity.toFixed(1).padStart(7),
    formatGap(s.gapAheadMinutes),
    STATUS_LABELS[s.status].padStart(9),
  ].join(' | ');
}

/** Minute-by-minute table for one aircraft */
export function formatTrajectory(record: AircraftRecord): string {
  const lines = [
    `Aircraft ${record.id} (radar contact ${formatSimTime(record.appearanceMinute)})`,
    HEADER,
    '-'.repeat(HEADER.length),
    ...record.history.map(formatSnapshotRow),
  ];
  return lines.join('\n');
}

/** One-line outcome of a run */
export function formatRunSummary(result: SimulationResult, metrics: RunMetrics): string {
  const closure = result.closure
    ? `closure ${formatSimTime(result.closure.startMinute)}-${formatSimTime(result.closure.endMinute)}`
    : 'no closure';
  return (
    `seed ${result.config.seed}: ${metrics.aircraftCount} aircraft, ` +
    `${metrics.landedCount} landed, ${metrics.divertedCount} diverted, ` +
    `${metrics.airborneAtHorizon} airborne at horizon, ` +
    `avg delay ${metrics.averageDelay.toFixed(2)} min, ` +
    `diversion p ${metrics.diversionProbability.toFixed(3)}, ` +
    `congestion ${metrics.congestionFrequency.toFixed(3)}, ${closure}`
  );
}
