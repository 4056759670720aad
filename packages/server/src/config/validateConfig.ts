import type { HorizonPolicy, SimulationConfig } from '@aep-sim/shared';
import { InvalidConfigurationError } from '../engine/errors.js';

const NUMERIC_FIELDS = [
  'arrivalRatePerMinute',
  'horizonMinutes',
  'seed',
  'initialDistanceNm',
  'reversalSpeedKnots',
  'minSeparationMinutes',
  'reinsertionBufferMinutes',
  'landingGapMinutes',
  'windAbortProbability',
  'maxDelayMinutes',
  'timeStepMinutes',
] as const satisfies ReadonlyArray<keyof SimulationConfig>;

const BOOLEAN_FIELDS = [
  'divertOnRadarExit',
  'divertPastDayEnd',
  'checkInvariants',
] as const satisfies ReadonlyArray<keyof SimulationConfig>;

const HORIZON_POLICIES: readonly HorizonPolicy[] = ['exclude', 'divert'];

function isNumber(v: unknown): v is number {
  return typeof v === 'number' && !Number.isNaN(v);
}

function isPositive(n: number): boolean {
  return Number.isFinite(n) && n > 0;
}

function isSpeedBand(v: unknown): boolean {
  return typeof v === 'object' && v !== null
    && 'aboveNm' in v && isNumber(v.aboveNm)
    && 'maxKnots' in v && isNumber(v.maxKnots)
    && 'minKnots' in v && isNumber(v.minKnots);
}

function closureShapeIssue(closure: unknown): string | null {
  if (closure === null) return null;
  if (typeof closure !== 'object' || !('kind' in closure)) {
    return 'closure must be null or an object with a kind';
  }
  if (closure.kind === 'fixed') {
    return 'startMinute' in closure && isNumber(closure.startMinute)
      && 'endMinute' in closure && isNumber(closure.endMinute)
      ? null
      : 'fixed closure needs numeric startMinute and endMinute';
  }
  if (closure.kind === 'random') {
    return 'durationMinutes' in closure && isNumber(closure.durationMinutes)
      ? null
      : 'random closure needs a numeric durationMinutes';
  }
  return `closure kind must be "fixed" or "random" (got ${JSON.stringify(closure.kind)})`;
}

/**
 * Field types only. Overrides arrive as parsed JSON, so a value may be of any
 * type whatever SimulationConfig says.
 */
export function shapeIssues(config: SimulationConfig): string[] {
  const issues: string[] = [];

  for (const key of NUMERIC_FIELDS) {
    const value: unknown = config[key];
    if (!isNumber(value)) issues.push(`${key} must be a number`);
  }
  for (const key of BOOLEAN_FIELDS) {
    const value: unknown = config[key];
    if (typeof value !== 'boolean') issues.push(`${key} must be true or false`);
  }

  const within: unknown = config.windAbortWithinMinutes;
  if (within !== null && !isNumber(within)) {
    issues.push('windAbortWithinMinutes must be a number or null');
  }

  const bands: unknown = config.speedBands;
  if (!Array.isArray(bands)) {
    issues.push('speedBands must be an array');
  } else if (!bands.every(isSpeedBand)) {
    issues.push('every speed band needs numeric aboveNm, maxKnots and minKnots');
  }

  const arrivals: unknown = config.arrivals;
  if (arrivals !== undefined && !(Array.isArray(arrivals) && arrivals.every(isNumber))) {
    issues.push('arrivals must be an array of minutes');
  }

  const policy: unknown = config.horizonPolicy;
  if (!HORIZON_POLICIES.some(p => p === policy)) {
    issues.push(`horizonPolicy must be "exclude" or "divert" (got ${JSON.stringify(policy)})`);
  }

  const closureIssue = closureShapeIssue(config.closure);
  if (closureIssue !== null) issues.push(closureIssue);

  return issues;
}

/** Every problem with a configuration; empty when it can run */
export function configIssues(config: SimulationConfig): string[] {
  // Range checks assume the right types
  const shape = shapeIssues(config);
  if (shape.length > 0) return shape;

  const issues: string[] = [];

  if (!Number.isInteger(config.horizonMinutes) || config.horizonMinutes <= 0) {
    issues.push(`horizonMinutes must be a positive integer (got ${config.horizonMinutes})`);
  }

  if (config.arrivals === undefined) {
    const rate = config.arrivalRatePerMinute;
    if (!Number.isFinite(rate) || rate <= 0 || rate > 1) {
      issues.push(`arrivalRatePerMinute must be in (0, 1] (got ${rate})`);
    }
  } else {
    const arrivals = config.arrivals;
    if (arrivals.some(m => !Number.isInteger(m))) {
      issues.push('arrivals must be whole minutes');
    }
    if (arrivals.some(m => m < 0 || m >= config.horizonMinutes)) {
      issues.push(`arrivals must fall inside [0, ${config.horizonMinutes})`);
    }
    if (arrivals.some((m, i) => i > 0 && m < arrivals[i - 1])) {
      issues.push('arrivals must be in ascending order');
    }
  }

  if (!Number.isInteger(config.seed)) {
    issues.push(`seed must be an integer (got ${config.seed})`);
  }

  if (!isPositive(config.initialDistanceNm)) {
    issues.push('initialDistanceNm must be positive');
  }
  if (!isPositive(config.reversalSpeedKnots)) {
    issues.push('reversalSpeedKnots must be positive');
  }
  if (!isPositive(config.timeStepMinutes)) {
    issues.push('timeStepMinutes must be positive');
  }
  if (!isPositive(config.maxDelayMinutes)) {
    issues.push('maxDelayMinutes must be positive');
  }
  if (!(config.minSeparationMinutes >= 0)) {
    issues.push('minSeparationMinutes must not be negative');
  }
  if (!(config.landingGapMinutes >= 0)) {
    issues.push('landingGapMinutes must not be negative');
  }
  if (!(config.reinsertionBufferMinutes > config.minSeparationMinutes)) {
    issues.push(
      `reinsertionBufferMinutes (${config.reinsertionBufferMinutes}) must exceed ` +
      `minSeparationMinutes (${config.minSeparationMinutes})`
    );
  }

  const p = config.windAbortProbability;
  if (!(p >= 0 && p <= 1)) {
    issues.push(`windAbortProbability must be in [0, 1] (got ${p})`);
  }
  if (config.windAbortWithinMinutes !== null && !(config.windAbortWithinMinutes >= 0)) {
    issues.push('windAbortWithinMinutes must not be negative');
  }

  if (config.speedBands.length === 0) {
    issues.push('speedBands must not be empty');
  }
  config.speedBands.forEach((band, i) => {
    if (!isPositive(band.minKnots) || !isPositive(band.maxKnots)) {
      issues.push(`speed band ${i} needs positive speeds`);
    } else if (band.minKnots > band.maxKnots) {
      issues.push(`speed band ${i} minimum ${band.minKnots}kt exceeds maximum ${band.maxKnots}kt`);
    }
    if (i > 0 && !(band.aboveNm < config.speedBands[i - 1].aboveNm)) {
      issues.push('speedBands must be ordered by descending aboveNm');
    }
  });

  const closure = config.closure;
  if (closure?.kind === 'fixed') {
    if (!Number.isInteger(closure.startMinute) || !Number.isInteger(closure.endMinute)) {
      issues.push('closure bounds must be whole minutes');
    }
    if (closure.endMinute <= closure.startMinute) {
      issues.push(`closure window [${closure.startMinute}, ${closure.endMinute}) is inverted or empty`);
    }
    if (closure.startMinute < 0 || closure.endMinute > config.horizonMinutes) {
      issues.push(`closure window must lie inside [0, ${config.horizonMinutes}]`);
    }
  } else if (closure?.kind === 'random') {
    if (!Number.isInteger(closure.durationMinutes) || closure.durationMinutes <= 0) {
      issues.push('closure durationMinutes must be a positive integer');
    }
    if (closure.durationMinutes > config.horizonMinutes) {
      issues.push(
        `closure durationMinutes (${closure.durationMinutes}) exceeds horizon (${config.horizonMinutes})`
      );
    }
  }

  return issues;
}

/** Fail fast before a run starts */
export function validateConfig(config: SimulationConfig): void {
  const issues = configIssues(config);
  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }
}
