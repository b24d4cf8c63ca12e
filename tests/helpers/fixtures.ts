/**
 * Shared test fixtures: small tracks, cars and teams with round numbers so
 * expected lap times can be derived by hand.
 */

import { createCar, createDriver, createStrategy, createTeam, createTrack } from '../../src/engine/entities';
import type { TrackInit } from '../../src/engine/entities';
import type { Rng } from '../../src/engine/rng';
import type { Car, Strategy, Team, Track } from '../../src/engine/types';

export function makeTrack(overrides: Partial<TrackInit> = {}): Track {
  return createTrack({
    name: 'Test Ring',
    straightRatio: 0.6,
    overtakeCoefficient: 0.5,
    energyHarvestFactor: 0.7,
    tyreDegradationFactor: 0.05,
    downforceSensitivity: 0.5,
    safetyCarLambda: 0,
    safetyCarResumeLambda: 0,
    ...overrides,
  });
}

export function makeCar(teamName: string, overrides: Partial<Omit<Car, 'teamName'>> = {}): Car {
  return createCar({
    teamName,
    baseSpeed: 80.0,
    ersEfficiency: 0.8,
    aeroEfficiency: 0.85,
    tyreWearRate: 1.0,
    reliability: 1.0,
    ...overrides,
  });
}

/**
 * Two-driver team. Driver names are `<name>1` and `<name>2`; the second
 * driver is `skillGap` seconds per lap slower.
 */
export function makeTeam(name: string, carOverrides: Partial<Omit<Car, 'teamName'>> = {}, skillGap = 3.0): Team {
  return createTeam(name, makeCar(name, carOverrides), [
    createDriver({ name: `${name}1`, teamName: name, skillOffset: 0.0, consistency: 1.0 }),
    createDriver({ name: `${name}2`, teamName: name, skillOffset: skillGap, consistency: 1.0 }),
  ]);
}

/** Zero deploy/harvest single-stint plan, so lap times follow the physics terms only. */
export function flatStrategy(overrides: Partial<Strategy> = {}): Strategy {
  return createStrategy({ deployLevel: 0, harvestLevel: 0, ...overrides });
}

/** Flat strategies for every driver of the given teams. */
export function flatStrategies(teams: readonly Team[]): Record<string, Strategy> {
  const result: Record<string, Strategy> = {};
  for (const team of teams) {
    for (const driver of team.drivers) result[driver.name] = flatStrategy();
  }
  return result;
}

/** Rng stub: every uniform is `value`, normals return the mean. Counts uniform draws. */
export class FixedRng implements Rng {
  calls = 0;

  constructor(private readonly value: number) {}

  next(): number {
    this.calls += 1;
    return this.value;
  }

  normal(mean: number): number {
    return mean;
  }
}
