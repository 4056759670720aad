import { readFileSync, readdirSync, existsSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { SimulationConfigOverrides } from '@aep-sim/shared';
import { InvalidConfigurationError } from '../engine/errors.js';

function findDataDir(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(process.cwd(), 'data'),
    resolve('data'),
    join(__dirname, '../../../../data'), // src/data -> src -> server -> packages -> root
    join(__dirname, '../../../data'),    // dist/data -> dist -> server -> packages (compiled)
  ];
  for (const dir of candidates) {
    if (existsSync(join(dir, 'scenarios'))) return dir;
  }
  return join(process.cwd(), 'data');
}

/** Scenario names are file stems: lowercase letters, digits and dashes */
const SCENARIO_NAME = /^[a-z0-9-]+$/;

/** Named configuration presets stored as JSON in data/scenarios */
export class ScenarioLoader {
  private dir: string;
  private cache = new Map<string, SimulationConfigOverrides>();

  constructor(dataDir: string = findDataDir()) {
    this.dir = join(dataDir, 'scenarios');
  }

  /** Available scenario names, sorted */
  list(): string[] {
    if (!existsSync(this.dir)) {
      console.warn(`[ScenarioLoader] No scenario directory at ${this.dir}`);
      return [];
    }
    return readdirSync(this.dir)
      .filter(f => f.endsWith('.json'))
      .map(f => f.slice(0, -'.json'.length))
      .sort();
  }

  /** Load a scenario's overrides; throws InvalidConfigurationError when unknown or unreadable */
  load(name: string): SimulationConfigOverrides {
    const cached = this.cache.get(name);
    if (cached) return structuredClone(cached);

    if (!SCENARIO_NAME.test(name)) {
      throw new InvalidConfigurationError([`invalid scenario name "${name}"`]);
    }
    const filePath = join(this.dir, `${name}.json`);
    if (!existsSync(filePath)) {
      throw new InvalidConfigurationError([`unknown scenario "${name}"`]);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (e) {
      console.warn(`[ScenarioLoader] Failed to parse ${filePath}:`, e);
      throw new InvalidConfigurationError([`scenario "${name}" is not valid JSON`]);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new InvalidConfigurationError([`scenario "${name}" must be a JSON object`]);
    }

    const overrides = parsed as SimulationConfigOverrides;
    this.cache.set(name, overrides);
    console.log(`[ScenarioLoader] Loaded ${name} from ${filePath}`);
    return structuredClone(overrides);
  }
}
