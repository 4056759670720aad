import type {
  AircraftState,
  ClosureWindow,
  MinuteSnapshot,
  SimulationConfig,
  SimulationResult,
} from '@aep-sim/shared';
import { validateConfig } from '../config/validateConfig.js';
import { generateArrivals } from '../traffic/ArrivalGenerator.js';
import { createRandomSource, type RandomSource } from '../traffic/random.js';
import { createAircraft, recordSnapshot, toRecord } from './aircraftState.js';
import { isRunwayClosed, resolveClosureWindow } from './closure.js';
import { DiversionPolicy } from './DiversionPolicy.js';
import { FlightQueue } from './FlightQueue.js';
import { Kinematics } from './Kinematics.js';
import { SeparationPolicy } from './SeparationPolicy.js';

/**
 * SimulationEngine: one closed run over minutes 0 … horizon−1.
 * Each minute: admit arrivals, sort, move, wind trials, landing/separation/
 * reinsertion, diversion, record.
 */
export class SimulationEngine {
  private config: SimulationConfig;
  private random: RandomSource;

  // Sub-engines
  private kinematics: Kinematics;
  private queue = new FlightQueue();
  private separation: SeparationPolicy;
  private diversion: DiversionPolicy;

  // State
  private closure: ClosureWindow | null;
  private arrivals: number[];
  private aircraft: AircraftState[];
  private nextArrival = 0;
  private minutes: MinuteSnapshot[] = [];
  private landedCount = 0;
  private divertedCount = 0;
  private congestionEventCount = 0;
  private hasRun = false;

  /**
   * Validates the configuration, then draws the arrival schedule and the
   * closure window from the run's generator, in that order.
   */
  constructor(config: SimulationConfig, random?: RandomSource) {
    validateConfig(config);
    this.config = config;
    this.random = random ?? createRandomSource(config.seed);

    this.kinematics = new Kinematics(config);
    this.arrivals = config.arrivals
      ? [...config.arrivals]
      : generateArrivals(config.arrivalRatePerMinute, config.horizonMinutes, this.random);
    this.closure = resolveClosureWindow(config.closure, config.horizonMinutes, this.random);

    this.separation = new SeparationPolicy(this.kinematics, config);
    this.diversion = new DiversionPolicy(this.kinematics, config, this.closure);

    const entrySpeed = this.kinematics.approachSpeed(config.initialDistanceNm);
    this.aircraft = this.arrivals.map((minute, i) =>
      createAircraft(i + 1, minute, config.initialDistanceNm, entrySpeed)
    );
  }

  /** Closure bounds used by this run */
  getClosure(): ClosureWindow | null {
    return this.closure;
  }

  getArrivals(): number[] {
    return [...this.arrivals];
  }

  /** Minutes an aircraft needs from radar contact to the runway with no traffic */
  get unimpededFlightMinutes(): number {
    return this.kinematics.expectedTimeToLand(this.config.initialDistanceNm);
  }

  /** Run every minute of the horizon. An engine runs once. */
  run(): SimulationResult {
    if (this.hasRun) {
      throw new Error('SimulationEngine.run() may only be called once; create a new engine');
    }
    this.hasRun = true;
    this.separation.reset();

    for (let minute = 0; minute < this.config.horizonMinutes; minute++) {
      this.tick(minute);
    }

    return this.buildResult();
  }

  private tick(minute: number): void {
    // 1. Admit aircraft appearing this minute
    while (
      this.nextArrival < this.aircraft.length &&
      this.aircraft[this.nextArrival].appearanceMinute === minute
    ) {
      this.queue.insert(this.aircraft[this.nextArrival]);
      this.nextArrival++;
    }

    // 2. Sort by distance to the runway
    this.queue.sort();

    // 3. Move everything that was already on radar
    const runwayClosed = isRunwayClosed(this.closure, minute);
    for (const ac of this.queue.selectActive(minute)) {
      if (ac.appearanceMinute < minute) {
        this.kinematics.advance(ac, runwayClosed);
      }
    }
    this.queue.sort();
    const exited = this.diversion.evaluateRadarExits(this.queue, minute);

    // 4. Wind, then separation, then diversion
    this.separation.applyWindAborts(this.queue, minute, this.random);
    const outcome = this.separation.enforce(this.queue, minute, runwayClosed);
    const diverted = [...exited, ...this.diversion.evaluate(this.queue, minute)];

    // 5. Record and drop terminal aircraft
    for (const ac of this.queue.getAll()) {
      recordSnapshot(ac, minute);
    }
    this.queue.removeTerminal();

    if (outcome.landed) this.landedCount++;
    this.divertedCount += diverted.length;
    this.congestionEventCount += outcome.congestionEvents;

    this.minutes.push({
      minute,
      inFlight: this.queue.inFlight().length,
      reversing: this.queue.reversing().length,
      landed: this.landedCount,
      diverted: this.divertedCount,
      congestionEvents: outcome.congestionEvents,
      landings: outcome.landed ? 1 : 0,
    });

    if (this.config.checkInvariants) {
      this.queue.assertConsistent(minute);
    }
  }

  private buildResult(): SimulationResult {
    const unimpeded = this.unimpededFlightMinutes;
    const records = this.aircraft.map(toRecord);

    const delays = records.flatMap(r =>
      r.landingMinute === null
        ? []
        : [{ id: r.id, delayMinutes: r.landingMinute - (r.appearanceMinute + unimpeded) }]
    );

    return {
      config: this.config,
      closure: this.closure,
      arrivals: [...this.arrivals],
      aircraft: records,
      minutes: this.minutes,
      landedCount: this.landedCount,
      divertedCount: this.divertedCount,
      airborneCount: this.queue.count,
      congestionEventCount: this.congestionEventCount,
      delays,
    };
  }
}

/** Validate, run once and return the record */
export function runSimulation(config: SimulationConfig, random?: RandomSource): SimulationResult {
  return new SimulationEngine(config, random).run();
}
