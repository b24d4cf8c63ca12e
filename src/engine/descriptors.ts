/**
 * Descriptor Parsing
 *
 * Turns loosely-typed records (parsed JSON/YAML from calendar files or the
 * calibration step) into validated value objects. Never throws on bad
 * input: every failure comes back as a ParseResult error naming the field.
 *
 * Descriptor keys are snake_case, matching the external file formats.
 */

import { DEFAULT_SAFETY_CAR_RESUME_LAMBDA, validateCar, validateTrack } from './entities';
import type { Car, FieldIssue, Track } from './types';

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FieldIssue };

/** Calibrated latent parameters for one team. */
export interface CalibratedCarParams {
  baseSpeed: number;
  reliability: number;
  ersEfficiency: number;
}

export type CalibrationParams = Record<string, CalibratedCarParams>;

export function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

function fail<T>(field: string, message: string): ParseResult<T> {
  return { ok: false, error: { field, message } };
}

function fromIssue<T>(value: T, issue: FieldIssue | null): ParseResult<T> {
  return issue ? { ok: false, error: issue } : { ok: true, value };
}

/** Read a required finite number, or report the missing/mistyped field. */
function readNumber(
  record: Record<string, unknown>,
  field: string,
): { ok: true; value: number } | { ok: false; error: FieldIssue } {
  const value = record[field];
  if (value === undefined) {
    return { ok: false, error: { field, message: `missing required field '${field}'` } };
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return { ok: false, error: { field, message: `'${field}' must be a finite number` } };
  }
  return { ok: true, value };
}

function readString(
  record: Record<string, unknown>,
  field: string,
): { ok: true; value: string } | { ok: false; error: FieldIssue } {
  const value = record[field];
  if (typeof value !== 'string' || value.length === 0) {
    return { ok: false, error: { field, message: `'${field}' must be a non-empty string` } };
  }
  return { ok: true, value };
}

// ──────────────────────────────────────────────────────────
// Track
// ──────────────────────────────────────────────────────────

const TRACK_NUMERIC_FIELDS = [
  'straight_ratio',
  'overtake_coefficient',
  'energy_harvest_factor',
  'tyre_degradation_factor',
  'downforce_sensitivity',
] as const;

export function parseTrackDescriptor(raw: unknown): ParseResult<Track> {
  if (!isRecord(raw)) return fail('<root>', 'track descriptor must be an object');

  const name = readString(raw, 'name');
  if (!name.ok) return name;

  const values: Record<(typeof TRACK_NUMERIC_FIELDS)[number], number> = {
    straight_ratio: 0,
    overtake_coefficient: 0,
    energy_harvest_factor: 0,
    tyre_degradation_factor: 0,
    downforce_sensitivity: 0,
  };
  for (const field of TRACK_NUMERIC_FIELDS) {
    const read = readNumber(raw, field);
    if (!read.ok) return read;
    values[field] = read.value;
  }

  let safetyCarLambda = 0;
  let safetyCarResumeLambda = DEFAULT_SAFETY_CAR_RESUME_LAMBDA;
  if (raw.safety_car_lambda !== undefined) {
    const read = readNumber(raw, 'safety_car_lambda');
    if (!read.ok) return read;
    safetyCarLambda = read.value;
  }
  if (raw.safety_car_resume_lambda !== undefined) {
    const read = readNumber(raw, 'safety_car_resume_lambda');
    if (!read.ok) return read;
    safetyCarResumeLambda = read.value;
  }

  const track: Track = {
    name: name.value,
    straightRatio: values.straight_ratio,
    overtakeCoefficient: values.overtake_coefficient,
    energyHarvestFactor: values.energy_harvest_factor,
    tyreDegradationFactor: values.tyre_degradation_factor,
    downforceSensitivity: values.downforce_sensitivity,
    safetyCarLambda,
    safetyCarResumeLambda,
  };
  return fromIssue(track, validateTrack(track));
}

// ──────────────────────────────────────────────────────────
// Car
// ──────────────────────────────────────────────────────────

export function parseCarDescriptor(raw: unknown): ParseResult<Car> {
  if (!isRecord(raw)) return fail('<root>', 'car descriptor must be an object');

  const teamName = readString(raw, 'team_name');
  if (!teamName.ok) return teamName;
  const baseSpeed = readNumber(raw, 'base_speed');
  if (!baseSpeed.ok) return baseSpeed;
  const ers = readNumber(raw, 'ers_efficiency');
  if (!ers.ok) return ers;
  const aero = readNumber(raw, 'aero_efficiency');
  if (!aero.ok) return aero;
  const wear = readNumber(raw, 'tyre_wear_rate');
  if (!wear.ok) return wear;
  const reliability = readNumber(raw, 'reliability');
  if (!reliability.ok) return reliability;

  const car: Car = {
    teamName: teamName.value,
    baseSpeed: baseSpeed.value,
    ersEfficiency: ers.value,
    aeroEfficiency: aero.value,
    tyreWearRate: wear.value,
    reliability: reliability.value,
  };
  return fromIssue(car, validateCar(car));
}

// ──────────────────────────────────────────────────────────
// Calibration
// ──────────────────────────────────────────────────────────

/**
 * Parse `{ team_name: { base_speed, reliability, ers_efficiency } }`.
 * Only presence and type are checked here: out-of-range values are clamped
 * when the teams are built (see forecast/calibration.ts).
 */
export function parseCalibrationDescriptor(raw: unknown): ParseResult<CalibrationParams> {
  if (!isRecord(raw)) return fail('<root>', 'calibration descriptor must be an object');

  const params: CalibrationParams = {};
  for (const [teamName, entry] of Object.entries(raw)) {
    if (!isRecord(entry)) {
      return fail(teamName, `calibration entry for '${teamName}' must be an object`);
    }
    const baseSpeed = readNumber(entry, 'base_speed');
    if (!baseSpeed.ok) return fail(`${teamName}.base_speed`, baseSpeed.error.message);
    if (baseSpeed.value <= 0) return fail(`${teamName}.base_speed`, 'base_speed must be > 0.0.');
    const reliability = readNumber(entry, 'reliability');
    if (!reliability.ok) return fail(`${teamName}.reliability`, reliability.error.message);
    const ers = readNumber(entry, 'ers_efficiency');
    if (!ers.ok) return fail(`${teamName}.ers_efficiency`, ers.error.message);

    params[teamName] = {
      baseSpeed: baseSpeed.value,
      reliability: reliability.value,
      ersEfficiency: ers.value,
    };
  }
  if (Object.keys(params).length === 0) {
    return fail('<root>', 'calibration descriptor must contain at least one team');
  }
  return { ok: true, value: params };
}
