/**
 * Speed band for a stretch of the approach. A band applies to positions
 * strictly beyond `aboveNm`.
 */
export interface SpeedBand {
  aboveNm: number;
  maxKnots: number;
  minKnots: number;
}

/** Runway closed for landings during [startMinute, endMinute) */
export interface ClosureWindow {
  startMinute: number;
  endMinute: number;
}

export type ClosureConfig =
  | ({ kind: 'fixed' } & ClosureWindow)
  /** Window of the given length placed uniformly inside the horizon */
  | { kind: 'random'; durationMinutes: number };

/** What happens to aircraft still airborne when the horizon ends */
export type HorizonPolicy = 'exclude' | 'divert';

export interface SimulationConfig {
  /** Probability of a new aircraft in any given minute */
  arrivalRatePerMinute: number;
  horizonMinutes: number;
  seed: number;
  /** Distance at which aircraft appear on radar (nm) */
  initialDistanceNm: number;
  /** Ordered by descending aboveNm */
  speedBands: SpeedBand[];
  reversalSpeedKnots: number;
  minSeparationMinutes: number;
  /** Separation needed to rejoin the approach; must exceed minSeparationMinutes */
  reinsertionBufferMinutes: number;
  landingGapMinutes: number;
  /** Per-minute go-around probability, 0 disables wind */
  windAbortProbability: number;
  /** Restrict wind trials to aircraft at most this many minutes from landing */
  windAbortWithinMinutes: number | null;
  closure: ClosureConfig | null;
  /** Minutes since radar contact after which an aircraft is diverted */
  maxDelayMinutes: number;
  /** Fraction of a minute flown per engine step */
  timeStepMinutes: number;
  horizonPolicy: HorizonPolicy;
  /** Divert a reversing aircraft once it backs out past initialDistanceNm */
  divertOnRadarExit: boolean;
  /** Divert, at any minute, an aircraft whose ETA falls after the last minute */
  divertPastDayEnd: boolean;
  /** Explicit appearance minutes; replaces the arrival generator */
  arrivals?: number[];
  /** Run the queue consistency check after every minute */
  checkInvariants: boolean;
}

export type SimulationConfigOverrides = Partial<SimulationConfig>;

/** Five bands from the AEP approach procedure */
export const DEFAULT_SPEED_BANDS: readonly SpeedBand[] = [
  { aboveNm: 100, maxKnots: 500, minKnots: 300 },
  { aboveNm: 50, maxKnots: 300, minKnots: 250 },
  { aboveNm: 15, maxKnots: 250, minKnots: 200 },
  { aboveNm: 5, maxKnots: 200, minKnots: 150 },
  { aboveNm: 0, maxKnots: 150, minKnots: 120 },
];

export const DEFAULT_SIMULATION_CONFIG: Readonly<SimulationConfig> = {
  arrivalRatePerMinute: 0.05,
  horizonMinutes: 1080, // 06:00 to midnight
  seed: 42,
  initialDistanceNm: 100,
  speedBands: [...DEFAULT_SPEED_BANDS],
  reversalSpeedKnots: 200,
  minSeparationMinutes: 4,
  reinsertionBufferMinutes: 5,
  landingGapMinutes: 10,
  windAbortProbability: 0,
  windAbortWithinMinutes: null,
  closure: null,
  maxDelayMinutes: 60,
  timeStepMinutes: 1,
  horizonPolicy: 'exclude',
  divertOnRadarExit: false,
  divertPastDayEnd: false,
  checkInvariants: false,
};

/**
 * Merge overrides over the defaults. Speed bands and arrivals are copied, not
 * merged; values of the wrong type are passed through for validation to report.
 */
export function resolveConfig(overrides: SimulationConfigOverrides = {}): SimulationConfig {
  const { speedBands, arrivals, ...rest } = overrides;
  const config: SimulationConfig = {
    ...DEFAULT_SIMULATION_CONFIG,
    ...rest,
    speedBands: speedBands === undefined
      ? DEFAULT_SPEED_BANDS.map(b => ({ ...b }))
      : Array.isArray(speedBands) ? speedBands.map(b => ({ ...b })) : speedBands,
  };
  if (arrivals !== undefined) {
    config.arrivals = Array.isArray(arrivals) ? [...arrivals] : arrivals;
  }
  return config;
}
