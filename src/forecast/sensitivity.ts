/**
 * Sensitivity and Volatility
 *
 * Central-difference elasticity of a driver's WDC probability with respect
 * to one car parameter, and the Shannon entropy of a WDC distribution.
 * Both perturbed fields run the season Monte Carlo with the same base seed.
 */

import { withCar } from '../engine/entities';
import type { Car, Team, Track } from '../engine/types';
import { simulateSeasonMonteCarlo } from './season';

/** Car parameters the analyzer can perturb (both live in [0, 1]). */
export type SensitivityParameter = 'reliability' | 'ersEfficiency';

export interface SensitivityInput {
  calendar: readonly Track[];
  /** Team whose car is perturbed; placed first in the field */
  team: Team;
  otherTeams: readonly Team[];
  driverName: string;
  lapsPerRace: number;
  seasons: number;
  /** Default 0.01 */
  delta?: number;
  /** Default 200 */
  baseSeed?: number;
  noiseStd?: number;
}

export const DEFAULT_SENSITIVITY_DELTA = 0.01;
export const DEFAULT_SENSITIVITY_BASE_SEED = 200;

function clampUnit(value: number): number {
  return Math.min(1.0, Math.max(0.0, value));
}

function readParameter(car: Car, parameter: SensitivityParameter): number {
  return parameter === 'reliability' ? car.reliability : car.ersEfficiency;
}

function withParameter(car: Car, parameter: SensitivityParameter, value: number): Car {
  return parameter === 'reliability' ? { ...car, reliability: value } : { ...car, ersEfficiency: value };
}

export function computeParameterSensitivity(
  parameter: SensitivityParameter,
  input: SensitivityInput,
): number {
  const delta = input.delta ?? DEFAULT_SENSITIVITY_DELTA;
  const baseSeed = input.baseSeed ?? DEFAULT_SENSITIVITY_BASE_SEED;
  const { team } = input;

  const current = readParameter(team.car, parameter);
  const plus = clampUnit(current + delta);
  const minus = clampUnit(current - delta);

  const wdcAt = (value: number): number => {
    const perturbed = withCar(team, withParameter(team.car, parameter, value));
    const forecast = simulateSeasonMonteCarlo(
      input.calendar,
      [perturbed, ...input.otherTeams],
      input.lapsPerRace,
      input.seasons,
      { baseSeed, noiseStd: input.noiseStd },
    );
    return forecast.wdcProbabilities[input.driverName] ?? 0.0;
  };

  const wdcPlus = wdcAt(plus);
  const wdcMinus = wdcAt(minus);

  const span = plus - minus;
  if (span === 0.0) return 0.0;
  return (wdcPlus - wdcMinus) / span;
}

export function computeReliabilitySensitivity(input: SensitivityInput): number {
  return computeParameterSensitivity('reliability', input);
}

export function computeErsSensitivity(input: SensitivityInput): number {
  return computeParameterSensitivity('ersEfficiency', input);
}

/** -sum(p ln p) in nats; zero probabilities contribute nothing. */
export function computeChampionshipEntropy(probabilities: Readonly<Record<string, number>>): number {
  let entropy = 0.0;
  for (const p of Object.values(probabilities)) {
    if (p > 0.0) entropy -= p * Math.log(p);
  }
  return entropy;
}
