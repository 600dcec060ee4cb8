import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { ConfigurationError } from '../../core/errors/LightError';
import { ajv, formatIssues, modelTableSchema } from '../../core/config/validation';
import { LedMode, ModelProfile, TemperatureEncoding } from '../../core/types/LightTypes';

export const DEFAULT_MODEL = 'default';

export const BUILTIN_MODELS_PATH = resolve(__dirname, '..', '..', '..', 'config', 'models.json');

export interface ModelEntry {
  ledMode?: keyof typeof LedMode;
  brightnessMax?: number;
  minKelvin?: number;
  maxKelvin?: number;
  temperatureEncoding?: TemperatureEncoding;
}

export type ModelTable = Record<string, ModelEntry>;

const validateCompleteTable = ajv.compile<ModelTable>(modelTableSchema(true));
const validatePartialTable = ajv.compile<ModelTable>(modelTableSchema(false));

// Only fills the type; the validated `default` entry sets every field
const GENERIC_PROFILE: ModelProfile = {
  model: DEFAULT_MODEL,
  ledMode: LedMode.MODE_2,
  brightnessMax: 255,
  minKelvin: 1000,
  maxKelvin: 6500,
  temperatureEncoding: 'rgb'
};

function normalizeModel(model: string): string {
  return model.trim().toUpperCase();
}

function resolveProfile(model: string, entry: ModelEntry, fallback: ModelProfile): ModelProfile {
  return {
    model,
    ledMode: entry.ledMode ? LedMode[entry.ledMode] : fallback.ledMode,
    brightnessMax: entry.brightnessMax ?? fallback.brightnessMax,
    minKelvin: entry.minKelvin ?? fallback.minKelvin,
    maxKelvin: entry.maxKelvin ?? fallback.maxKelvin,
    temperatureEncoding: entry.temperatureEncoding ?? fallback.temperatureEncoding
  };
}

/**
 * Static model table. Unknown models resolve to the `default` profile so a
 * fixture is never refused for lack of an entry.
 */
export class ModelCatalog {
  private readonly profiles = new Map<string, ModelProfile>();
  private readonly fallback: ModelProfile;

  private constructor(table: ModelTable, source: string) {
    this.fallback = resolveProfile(DEFAULT_MODEL, table[DEFAULT_MODEL], GENERIC_PROFILE);

    const issues: string[] = [];
    for (const [key, entry] of Object.entries(table)) {
      const profile = key === DEFAULT_MODEL
        ? this.fallback
        : resolveProfile(normalizeModel(key), entry, this.fallback);
      if (profile.minKelvin > profile.maxKelvin) {
        issues.push(`${key}: minKelvin ${profile.minKelvin} exceeds maxKelvin ${profile.maxKelvin}`);
      }
      if (key !== DEFAULT_MODEL) {
        this.profiles.set(profile.model, profile);
      }
    }

    if (issues.length > 0) {
      throw new ConfigurationError(`Invalid model table in ${source}`, issues);
    }
  }

  static fromTable(table: unknown, source = 'inline table'): ModelCatalog {
    if (!validateCompleteTable(table)) {
      throw new ConfigurationError(
        `Invalid model table in ${source}`,
        formatIssues(validateCompleteTable.errors)
      );
    }
    return new ModelCatalog(table, source);
  }

  /**
   * Loads the built-in table, optionally merging a user table over it entry
   * by entry.
   */
  static async load(overridesPath?: string): Promise<ModelCatalog> {
    const builtin = await readTable(BUILTIN_MODELS_PATH);
    if (!overridesPath) {
      return ModelCatalog.fromTable(builtin, BUILTIN_MODELS_PATH);
    }

    const overrides = await readTable(overridesPath);
    if (!validatePartialTable(overrides)) {
      throw new ConfigurationError(
        `Invalid model table in ${overridesPath}`,
        formatIssues(validatePartialTable.errors)
      );
    }
    if (!validatePartialTable(builtin)) {
      throw new ConfigurationError(
        `Invalid model table in ${BUILTIN_MODELS_PATH}`,
        formatIssues(validatePartialTable.errors)
      );
    }

    const merged: ModelTable = { ...builtin };
    for (const [key, entry] of Object.entries(overrides)) {
      const existing = Object.keys(merged).find(name => normalizeModel(name) === normalizeModel(key));
      const name = existing ?? key;
      merged[name] = { ...(merged[name] || {}), ...entry };
    }
    return ModelCatalog.fromTable(merged, overridesPath);
  }

  lookup(model: string): ModelProfile {
    return this.profiles.get(normalizeModel(model)) ?? { ...this.fallback, model: normalizeModel(model) };
  }

  has(model: string): boolean {
    return this.profiles.has(normalizeModel(model));
  }

  getDefault(): ModelProfile {
    return { ...this.fallback };
  }

  list(): ModelProfile[] {
    return [this.getDefault(), ...this.profiles.values()];
  }
}

async function readTable(path: string): Promise<unknown> {
  try {
    const raw = await readFile(path, 'utf8');
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read model table ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
