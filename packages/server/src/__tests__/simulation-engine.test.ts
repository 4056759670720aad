/**
 * SimulationEngine Scenario Tests
 *
 * Small hand-built traffic situations run through the full minute loop:
 * unimpeded approach, reversal and reinsertion, closure hold and diversion,
 * wind go-arounds and the end-of-horizon policies.
 */
import { describe, it, expect } from 'vitest';
import type { AircraftRecord, AircraftSnapshot } from '@aep-sim/shared';
import { SimulationEngine, runSimulation } from '../engine/SimulationEngine.js';
import { sequenceRandomSource } from '../traffic/random.js';
import { testConfig } from './helpers.js';

function snapshotAt(record: AircraftRecord, minute: number): AircraftSnapshot {
  const snap = record.history.find(s => s.minute === minute);
  if (!snap) throw new Error(`aircraft ${record.id} has no snapshot at minute ${minute}`);
  return snap;
}

function aircraft(records: AircraftRecord[], id: number): AircraftRecord {
  const record = records.find(r => r.id === id);
  if (!record) throw new Error(`no aircraft ${id}`);
  return record;
}

describe('SimulationEngine', () => {
  // ── Single aircraft ────────────────────────────────────────────────────────

  describe('unimpeded approach', () => {
    const result = runSimulation(testConfig({ arrivals: [0], horizonMinutes: 40 }));
    const a = aircraft(result.aircraft, 1);

    it('lands after the unimpeded flight time', () => {
      expect(a.status).toBe('landed');
      expect(a.landingMinute).toBe(23);
      expect(result.delays).toEqual([{ id: 1, delayMinutes: 0 }]);
    });

    it('records radar contact then one row per minute through landing', () => {
      expect(a.history[0]).toEqual({
        minute: 0,
        position: 100,
        velocity: 300,
        status: 'inFlight',
        gapAheadMinutes: null,
      });
      expect(snapshotAt(a, 1).position).toBe(95);
      expect(a.history).toHaveLength(24);
      expect(a.history[23]).toEqual({
        minute: 23,
        position: 0,
        velocity: 0,
        status: 'landed',
        gapAheadMinutes: null,
      });
    });

    it('counts per minute', () => {
      expect(result.minutes).toHaveLength(40);
      expect(result.minutes[22]).toMatchObject({ inFlight: 1, landed: 0, landings: 0 });
      expect(result.minutes[23]).toMatchObject({ inFlight: 0, landed: 1, landings: 1 });
      expect(result.landedCount).toBe(1);
      expect(result.divertedCount).toBe(0);
      expect(result.airborneCount).toBe(0);
    });

    it('reports the unimpeded time', () => {
      expect(new SimulationEngine(testConfig({ arrivals: [0] })).unimpededFlightMinutes).toBe(23);
    });
  });

  // ── Spacing ────────────────────────────────────────────────────────────────

  describe('follower one minute behind', () => {
    const result = runSimulation(testConfig({ arrivals: [0, 1], horizonMinutes: 80 }));
    const first = aircraft(result.aircraft, 1);
    const second = aircraft(result.aircraft, 2);

    it('reverses the follower on contact', () => {
      const snap = snapshotAt(second, 1);
      expect(snap.status).toBe('reversing');
      expect(snap.velocity).toBe(-200);
      expect(snap.position).toBe(100);
      expect(snap.gapAheadMinutes).toBe(1);
      expect(second.congestionEvents).toBe(1);
    });

    it('keeps reversing until both buffers are met', () => {
      expect(snapshotAt(second, 2).status).toBe('reversing');
      expect(snapshotAt(second, 3).status).toBe('reversing');
      const rejoin = snapshotAt(second, 4);
      expect(rejoin.status).toBe('inFlight');
      expect(rejoin.velocity).toBe(500);
      expect(rejoin.position).toBeCloseTo(110, 9);
      expect(rejoin.gapAheadMinutes).toBeCloseTo(6, 9);
    });

    it('does not reverse the follower again', () => {
      expect(second.reversalCount).toBe(1);
      expect(result.congestionEventCount).toBe(1);
    });

    it('lands both a full landing gap apart', () => {
      expect(first.landingMinute).toBe(23);
      expect(second.landingMinute).toBe(33);
      expect(result.delays).toEqual([
        { id: 1, delayMinutes: 0 },
        { id: 2, delayMinutes: 9 },
      ]);
    });

    it('holds the follower on the threshold until the gap elapses', () => {
      const held = snapshotAt(second, 32);
      expect(held).toMatchObject({ position: 0, velocity: 0, status: 'inFlight' });
    });
  });

  // ── Closure ────────────────────────────────────────────────────────────────

  describe('closure the aircraft can wait out', () => {
    const result = runSimulation(testConfig({
      arrivals: [0],
      horizonMinutes: 60,
      maxDelayMinutes: 60,
      closure: { kind: 'fixed', startMinute: 10, endMinute: 30 },
    }));
    const a = aircraft(result.aircraft, 1);

    it('slows to the band minimum while closed', () => {
      const snap = snapshotAt(a, 10);
      expect(snap.velocity).toBe(250);
      expect(snap.position).toBeCloseTo(50.8333, 4);
    });

    it('holds on the threshold and lands when the runway reopens', () => {
      expect(snapshotAt(a, 28)).toMatchObject({ position: 0, velocity: 0, status: 'inFlight' });
      expect(a.landingMinute).toBe(30);
      expect(result.delays).toEqual([{ id: 1, delayMinutes: 7 }]);
      expect(result.closure).toEqual({ startMinute: 10, endMinute: 30 });
    });
  });

  describe('closure beyond the delay bound', () => {
    const result = runSimulation(testConfig({
      arrivals: [0],
      horizonMinutes: 60,
      maxDelayMinutes: 30,
      closure: { kind: 'fixed', startMinute: 5, endMinute: 40 },
    }));
    const a = aircraft(result.aircraft, 1);

    it('diverts on radar contact', () => {
      expect(a.status).toBe('diverted');
      expect(a.diversionMinute).toBe(0);
      expect(a.finalPhase).toEqual({ kind: 'diverted', diversionMinute: 0, reason: 'closure' });
      expect(result.divertedCount).toBe(1);
      expect(result.delays).toEqual([]);
    });

    it('stops recording after the diversion', () => {
      expect(a.history).toEqual([
        { minute: 0, position: 100, velocity: 0, status: 'diverted', gapAheadMinutes: null },
      ]);
    });
  });

  // ── Optional diversion rules ───────────────────────────────────────────────

  describe('radar exit rule', () => {
    const result = runSimulation(testConfig({ arrivals: [0, 1], horizonMinutes: 40, divertOnRadarExit: true }));
    const second = aircraft(result.aircraft, 2);

    it('diverts the reversing follower once it backs past 100nm', () => {
      expect(snapshotAt(second, 1).status).toBe('reversing');
      expect(second.finalPhase).toEqual({ kind: 'diverted', diversionMinute: 2, reason: 'radarExit' });
      expect(second.history).toHaveLength(2);
      expect(second.history[1].position).toBeCloseTo(103.3333, 4);
      expect(second.history[1].velocity).toBe(0);
    });

    it('leaves the leader unaffected', () => {
      expect(aircraft(result.aircraft, 1).landingMinute).toBe(23);
      expect(result.divertedCount).toBe(1);
      expect(result.delays).toEqual([{ id: 1, delayMinutes: 0 }]);
    });
  });

  it('diverts an arrival that cannot land before the day ends', () => {
    const result = runSimulation(testConfig({ arrivals: [0, 20], horizonMinutes: 40, divertPastDayEnd: true }));
    expect(aircraft(result.aircraft, 1).landingMinute).toBe(23);
    const late = aircraft(result.aircraft, 2);
    expect(late.finalPhase).toEqual({ kind: 'diverted', diversionMinute: 20, reason: 'dayEnd' });
    expect(late.history).toHaveLength(1);
  });

  it('places a random closure with one draw after the arrivals', () => {
    const engine = new SimulationEngine(
      testConfig({ arrivals: [], horizonMinutes: 120, closure: { kind: 'random', durationMinutes: 30 } }),
      sequenceRandomSource([0.5])
    );
    expect(engine.getClosure()).toEqual({ startMinute: 45, endMinute: 75 });
    expect(engine.getArrivals()).toEqual([]);
  });

  // ── Wind ───────────────────────────────────────────────────────────────────

  describe('wind', () => {
    it('alternates go-arounds and rejoins when every trial fails', () => {
      const result = runSimulation(
        testConfig({ arrivals: [0], horizonMinutes: 6, windAbortProbability: 0.2 }),
        sequenceRandomSource([0.1])
      );
      const a = aircraft(result.aircraft, 1);
      expect(a.history.map(s => s.status)).toEqual([
        'reversing', 'inFlight', 'reversing', 'inFlight', 'reversing', 'inFlight',
      ]);
      expect(snapshotAt(a, 1).position).toBeCloseTo(103.3333, 4);
      expect(snapshotAt(a, 1).velocity).toBe(500);
      expect(snapshotAt(a, 2).position).toBeCloseTo(95, 9);
      expect(a.reversalCount).toBe(3);
      expect(a.finalPhase.kind).toBe('inFlight');
      // Wind go-arounds are not separation losses
      expect(result.congestionEventCount).toBe(0);
    });

    it('changes nothing when every trial passes', () => {
      const result = runSimulation(
        testConfig({ arrivals: [0], horizonMinutes: 30, windAbortProbability: 0.2 }),
        sequenceRandomSource([0.9])
      );
      expect(aircraft(result.aircraft, 1).landingMinute).toBe(23);
    });
  });

  // ── End of horizon ─────────────────────────────────────────────────────────

  describe('end of horizon', () => {
    it('leaves aircraft airborne by default', () => {
      const result = runSimulation(testConfig({ arrivals: [0], horizonMinutes: 10 }));
      const a = aircraft(result.aircraft, 1);
      expect(result.airborneCount).toBe(1);
      expect(a.status).toBe('inFlight');
      expect(a.history).toHaveLength(10);
    });

    it('diverts aircraft still airborne under the divert policy', () => {
      const result = runSimulation(testConfig({ arrivals: [0], horizonMinutes: 10, horizonPolicy: 'divert' }));
      const a = aircraft(result.aircraft, 1);
      expect(a.finalPhase).toEqual({ kind: 'diverted', diversionMinute: 9, reason: 'horizon' });
      expect(result.airborneCount).toBe(0);
      expect(result.divertedCount).toBe(1);
    });

    it('admits every scheduled arrival once, same-minute arrivals included', () => {
      const result = runSimulation(testConfig({ arrivals: [0, 0, 5], horizonMinutes: 10 }));
      expect(result.aircraft.map(r => r.id)).toEqual([1, 2, 3]);
      expect(result.aircraft.map(r => r.appearanceMinute)).toEqual([0, 0, 5]);
    });
  });

  it('runs only once', () => {
    const engine = new SimulationEngine(testConfig({ arrivals: [0], horizonMinutes: 5 }));
    engine.run();
    expect(() => engine.run()).toThrow('SimulationEngine.run() may only be called once');
  });
});
