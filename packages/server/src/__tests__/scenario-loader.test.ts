/**
 * ScenarioLoader Tests
 *
 * Reads the bundled presets from data/scenarios, plus a scratch directory
 * for malformed files.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ScenarioLoader } from '../data/ScenarioLoader.js';
import { InvalidConfigurationError } from '../engine/errors.js';
import { configIssues } from '../config/validateConfig.js';
import { resolveConfig } from '@aep-sim/shared';

describe('ScenarioLoader (bundled presets)', () => {
  const loader = new ScenarioLoader();

  it('lists the presets by name', () => {
    expect(loader.list()).toEqual(['baseline', 'full-day', 'storm', 'windy']);
  });

  it('loads the baseline preset', () => {
    expect(loader.load('baseline')).toEqual({
      arrivalRatePerMinute: 0.05,
      horizonMinutes: 120,
      seed: 7,
      windAbortProbability: 0,
      closure: null,
    });
  });

  it('ships only valid presets', () => {
    for (const name of loader.list()) {
      expect(configIssues(resolveConfig(loader.load(name)))).toEqual([]);
    }
  });

  it('returns a fresh copy each time', () => {
    const first = loader.load('storm');
    first.seed = 1;
    expect(loader.load('storm').seed).toBe(42);
  });

  it('rejects an unknown scenario', () => {
    expect(() => loader.load('missing')).toThrow(InvalidConfigurationError);
    expect(() => loader.load('missing')).toThrow('unknown scenario "missing"');
  });

  it('rejects names that are not plain file stems', () => {
    expect(() => loader.load('../package')).toThrow('invalid scenario name "../package"');
  });
});

describe('ScenarioLoader (scratch directory)', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'scenario-loader-'));
    mkdirSync(join(dir, 'scenarios'));
    writeFileSync(join(dir, 'scenarios', 'broken.json'), '{ "seed": ');
    writeFileSync(join(dir, 'scenarios', 'list.json'), '[1, 2]');
    writeFileSync(join(dir, 'scenarios', 'notes.txt'), 'not a scenario');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists only JSON files', () => {
    expect(new ScenarioLoader(dir).list()).toEqual(['broken', 'list']);
  });

  it('rejects malformed JSON', () => {
    expect(() => new ScenarioLoader(dir).load('broken')).toThrow('scenario "broken" is not valid JSON');
  });

  it('rejects a file that is not an object', () => {
    expect(() => new ScenarioLoader(dir).load('list')).toThrow('scenario "list" must be a JSON object');
  });

  it('lists nothing when the directory is missing', () => {
    expect(new ScenarioLoader(join(dir, 'nowhere')).list()).toEqual([]);
  });
});
