/**
 * Entity Construction and Validation
 *
 * Constructors for the immutable value objects in types.ts. Each entity has
 * a field validator returning the first FieldIssue (or null); the create*
 * functions throw on that issue, while descriptors.ts turns it into a
 * structured parse error.
 */

import { Compound } from './types';
import type { Car, Driver, FieldIssue, Strategy, Team, Track } from './types';

// ──────────────────────────────────────────────────────────
// Shared checks
// ──────────────────────────────────────────────────────────

function checkUnit(field: string, value: number): FieldIssue | null {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    return { field, message: `${field} must be between 0.0 and 1.0.` };
  }
  return null;
}

function checkNonNegative(field: string, value: number): FieldIssue | null {
  if (!Number.isFinite(value) || value < 0) {
    return { field, message: `${field} must be >= 0.0.` };
  }
  return null;
}

function checkName(field: string, value: string): FieldIssue | null {
  if (value.length === 0) {
    return { field, message: `${field} must not be empty.` };
  }
  return null;
}

function firstIssue(...issues: (FieldIssue | null)[]): FieldIssue | null {
  return issues.find((issue) => issue !== null) ?? null;
}

function orThrow<T>(value: T, issue: FieldIssue | null): T {
  if (issue) throw new Error(issue.message);
  return value;
}

// ──────────────────────────────────────────────────────────
// Track
// ──────────────────────────────────────────────────────────

/** Track fields; safety-car rates are optional. */
export type TrackInit = Omit<Track, 'safetyCarLambda' | 'safetyCarResumeLambda'> &
  Partial<Pick<Track, 'safetyCarLambda' | 'safetyCarResumeLambda'>>;

/** Resume probability used when a track only specifies a trigger rate. */
export const DEFAULT_SAFETY_CAR_RESUME_LAMBDA = 0.5;

export function validateTrack(track: Track): FieldIssue | null {
  return firstIssue(
    checkName('name', track.name),
    checkUnit('straight_ratio', track.straightRatio),
    checkUnit('overtake_coefficient', track.overtakeCoefficient),
    checkUnit('energy_harvest_factor', track.energyHarvestFactor),
    checkNonNegative('tyre_degradation_factor', track.tyreDegradationFactor),
    checkNonNegative('downforce_sensitivity', track.downforceSensitivity),
    checkUnit('safety_car_lambda', track.safetyCarLambda),
    checkUnit('safety_car_resume_lambda', track.safetyCarResumeLambda),
  );
}

export function createTrack(init: TrackInit): Track {
  const track: Track = {
    ...init,
    safetyCarLambda: init.safetyCarLambda ?? 0,
    safetyCarResumeLambda: init.safetyCarResumeLambda ?? DEFAULT_SAFETY_CAR_RESUME_LAMBDA,
  };
  return orThrow(track, validateTrack(track));
}

// ──────────────────────────────────────────────────────────
// Car / Driver
// ──────────────────────────────────────────────────────────

export function validateCar(car: Car): FieldIssue | null {
  const speedIssue: FieldIssue | null =
    Number.isFinite(car.baseSpeed) && car.baseSpeed > 0
      ? null
      : { field: 'base_speed', message: 'base_speed must be > 0.0.' };
  return firstIssue(
    checkName('team_name', car.teamName),
    speedIssue,
    checkUnit('ers_efficiency', car.ersEfficiency),
    checkUnit('aero_efficiency', car.aeroEfficiency),
    checkNonNegative('tyre_wear_rate', car.tyreWearRate),
    checkUnit('reliability', car.reliability),
  );
}

export function createCar(car: Car): Car {
  return orThrow({ ...car }, validateCar(car));
}

export function validateDriver(driver: Driver): FieldIssue | null {
  const consistencyIssue: FieldIssue | null =
    Number.isFinite(driver.consistency) && driver.consistency > 0
      ? null
      : { field: 'consistency', message: 'consistency must be > 0.0.' };
  const skillIssue: FieldIssue | null = Number.isFinite(driver.skillOffset)
    ? null
    : { field: 'skill_offset', message: 'skill_offset must be a finite number.' };
  return firstIssue(
    checkName('name', driver.name),
    checkName('team_name', driver.teamName),
    skillIssue,
    consistencyIssue,
  );
}

export function createDriver(driver: Driver): Driver {
  return orThrow({ ...driver }, validateDriver(driver));
}

// ──────────────────────────────────────────────────────────
// Team
// ──────────────────────────────────────────────────────────

/**
 * Pair a car with exactly two drivers whose team name matches.
 * The car is held by reference; rebuilding a team with a perturbed car
 * leaves the drivers shared.
 */
export function createTeam(name: string, car: Car, drivers: readonly Driver[]): Team {
  if (name.length === 0) {
    throw new Error('Team name must not be empty.');
  }
  if (drivers.length !== 2) {
    throw new Error(`Team '${name}' must have exactly 2 drivers, got ${drivers.length}.`);
  }
  for (const driver of drivers) {
    if (driver.teamName !== name) {
      throw new Error(
        `Driver '${driver.name}' team_name '${driver.teamName}' does not match Team name '${name}'.`,
      );
    }
  }
  return { name, car, drivers: [drivers[0], drivers[1]] };
}

/** Same team and drivers with a different car. */
export function withCar(team: Team, car: Car): Team {
  return createTeam(team.name, createCar(car), team.drivers);
}

// ──────────────────────────────────────────────────────────
// Strategy
// ──────────────────────────────────────────────────────────

export interface StrategyInit {
  deployLevel: number;
  harvestLevel: number;
  compoundSequence?: readonly Compound[];
  pitLaps?: readonly number[];
}

export function validateStrategy(strategy: Strategy): FieldIssue | null {
  const { compoundSequence, pitLaps } = strategy;
  let scheduleIssue: FieldIssue | null = null;
  if (compoundSequence.length !== pitLaps.length + 1) {
    scheduleIssue = {
      field: 'compound_sequence',
      message: 'compound_sequence length must be len(pit_laps) + 1.',
    };
  } else if (pitLaps.some((lap) => !Number.isInteger(lap) || lap < 1)) {
    scheduleIssue = { field: 'pit_laps', message: 'pit_laps must be positive integers.' };
  } else if (pitLaps.some((lap, i) => i > 0 && lap < pitLaps[i - 1])) {
    scheduleIssue = { field: 'pit_laps', message: 'pit_laps must be sorted in ascending order.' };
  } else if (new Set(pitLaps).size !== pitLaps.length) {
    scheduleIssue = { field: 'pit_laps', message: 'pit_laps must not contain duplicates.' };
  }
  return firstIssue(
    checkUnit('deploy_level', strategy.deployLevel),
    checkUnit('harvest_level', strategy.harvestLevel),
    scheduleIssue,
  );
}

/** Defaults to a single MEDIUM stint with no stops. */
export function createStrategy(init: StrategyInit): Strategy {
  const strategy: Strategy = {
    deployLevel: init.deployLevel,
    harvestLevel: init.harvestLevel,
    compoundSequence: [...(init.compoundSequence ?? [Compound.Medium])],
    pitLaps: [...(init.pitLaps ?? [])],
  };
  return orThrow(strategy, validateStrategy(strategy));
}
