/**
 * Batch-runner plumbing: environment overrides and calibration files.
 */

import { readFileSync } from 'node:fs';
import { DEFAULT_CALENDAR_ID } from '../calendars/registry';
import { parseCalibrationDescriptor } from '../engine/descriptors';
import type { CalibrationParams } from '../engine/descriptors';
import type { ForecastConfigOverrides, MonteCarloConfig } from './forecast-config';

export interface ForecastEnv {
  overrides: ForecastConfigOverrides;
  calendarId: string;
  /** Path to a calibration JSON file; the built-in field is used when absent */
  calibrationPath?: string;
}

export type EnvParseResult =
  | { ok: true; value: ForecastEnv }
  | { ok: false; error: string };

const INTEGER = /^-?\d+$/;

function readInteger(
  env: Readonly<Record<string, string | undefined>>,
  name: string,
  min: number,
): { ok: true; value: number | undefined } | { ok: false; error: string } {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return { ok: true, value: undefined };
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!INTEGER.test(trimmed) || !Number.isSafeInteger(value) || value < min) {
    return { ok: false, error: `Invalid ${name}: ${raw}. Must be an integer >= ${min}.` };
  }
  return { ok: true, value };
}

/** Read FORECAST_* variables. Unset variables leave the defaults alone. */
export function parseForecastEnv(env: Readonly<Record<string, string | undefined>>): EnvParseResult {
  const seasons = readInteger(env, 'FORECAST_SEASONS', 1);
  if (!seasons.ok) return seasons;
  const laps = readInteger(env, 'FORECAST_LAPS', 1);
  if (!laps.ok) return laps;
  const seed = readInteger(env, 'FORECAST_SEED', Number.MIN_SAFE_INTEGER);
  if (!seed.ok) return seed;

  const overrides: ForecastConfigOverrides = {};
  if (laps.value !== undefined) overrides.race = { lapsPerRace: laps.value };
  const monteCarlo: Partial<MonteCarloConfig> = {};
  if (seasons.value !== undefined) monteCarlo.seasons = seasons.value;
  if (seed.value !== undefined) monteCarlo.baseSeed = seed.value;
  if (Object.keys(monteCarlo).length > 0) overrides.monteCarlo = monteCarlo;

  const calibrationPath = env.FORECAST_CALIBRATION?.trim();
  return {
    ok: true,
    value: {
      overrides,
      calendarId: env.FORECAST_CALENDAR?.trim() || DEFAULT_CALENDAR_ID,
      calibrationPath: calibrationPath ? calibrationPath : undefined,
    },
  };
}

/** Read and validate a calibration JSON file. Throws naming the file and field. */
export function loadCalibrationFile(path: string): CalibrationParams {
  const text = readFileSync(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`${path}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  const parsed = parseCalibrationDescriptor(raw);
  if (!parsed.ok) {
    throw new Error(`${path}: ${parsed.error.field}: ${parsed.error.message}`);
  }
  return parsed.value;
}
