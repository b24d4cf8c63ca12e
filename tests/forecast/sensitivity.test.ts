import { describe, it, expect } from 'vitest';
import {
  computeChampionshipEntropy,
  computeErsSensitivity,
  computeParameterSensitivity,
  computeReliabilitySensitivity,
} from '../../src/forecast/sensitivity';
import type { SensitivityInput } from '../../src/forecast/sensitivity';
import { simulateSeasonMonteCarlo } from '../../src/forecast/season';
import { withCar } from '../../src/engine/entities';
import { makeTeam, makeTrack } from '../helpers/fixtures';

const calendar = [makeTrack({ name: 'Ring One' }), makeTrack({ name: 'Ring Two' })];

function dominantInput(overrides: Partial<SensitivityInput> = {}): SensitivityInput {
  return {
    calendar,
    team: makeTeam('A', { baseSpeed: 75 }),
    otherTeams: [makeTeam('B', { baseSpeed: 85 })],
    driverName: 'A1',
    lapsPerRace: 5,
    seasons: 5,
    noiseStd: 0,
    ...overrides,
  };
}

describe('computeChampionshipEntropy', () => {
  it('is ln 2 for a two-way coin flip', () => {
    expect(computeChampionshipEntropy({ A1: 0.5, B1: 0.5 })).toBeCloseTo(Math.LN2, 12);
  });

  it('is zero for a certain champion', () => {
    expect(computeChampionshipEntropy({ A1: 1, B1: 0 })).toBe(0);
  });

  it('grows with the number of equal contenders', () => {
    const four = computeChampionshipEntropy({ a: 0.25, b: 0.25, c: 0.25, d: 0.25 });
    expect(four).toBeCloseTo(Math.log(4), 12);
  });
});

describe('computeParameterSensitivity', () => {
  it('is zero when the title is never in doubt', () => {
    expect(computeErsSensitivity(dominantInput())).toBe(0);
  });

  it('is zero for a zero step', () => {
    expect(computeParameterSensitivity('reliability', dominantInput({ delta: 0 }))).toBe(0);
  });

  it('matches the named wrappers', () => {
    const input = dominantInput({ seasons: 3 });
    expect(computeReliabilitySensitivity(input)).toBe(computeParameterSensitivity('reliability', input));
    expect(computeErsSensitivity(input)).toBe(computeParameterSensitivity('ersEfficiency', input));
  });

  it('reports zero for a driver outside the field', () => {
    expect(computeErsSensitivity(dominantInput({ driverName: 'Nobody' }))).toBe(0);
  });
});

// ──────────────────────────────────────────────────────────
// Contested field: reliability changes the title odds
// ──────────────────────────────────────────────────────────
describe('computeParameterSensitivity in a contested field', () => {
  const SEASONS = 200;
  const BASE_SEED = 200;
  const NOISE = 0.3;

  function contestedInput(reliability: number, delta: number): SensitivityInput {
    return {
      calendar,
      team: makeTeam('A', { reliability }, 0.05),
      otherTeams: [makeTeam('B', { reliability }, 0.05)],
      driverName: 'A1',
      lapsPerRace: 10,
      seasons: SEASONS,
      delta,
      baseSeed: BASE_SEED,
      noiseStd: NOISE,
    };
  }

  /** A1's title probability with team A's reliability set to `value`. */
  function wdcAt(input: SensitivityInput, value: number): number {
    const perturbed = withCar(input.team, { ...input.team.car, reliability: value });
    const forecast = simulateSeasonMonteCarlo(calendar, [perturbed, ...input.otherTeams], 10, SEASONS, {
      baseSeed: BASE_SEED,
      noiseStd: NOISE,
    });
    return forecast.wdcProbabilities.A1;
  }

  it('rises with reliability and uses the full two-sided span', () => {
    const input = contestedInput(0.97, 0.02);
    const elasticity = computeReliabilitySensitivity(input);
    const plus = 0.97 + 0.02;
    const minus = 0.97 - 0.02;

    expect(elasticity).toBeGreaterThan(0);
    expect(elasticity).toBeCloseTo((wdcAt(input, plus) - wdcAt(input, minus)) / (plus - minus), 12);
  });

  it('divides by the one-sided span when the parameter sits at its upper bound', () => {
    const input = contestedInput(1.0, 0.05);
    const elasticity = computeReliabilitySensitivity(input);
    const minus = 1.0 - 0.05;
    const change = wdcAt(input, 1.0) - wdcAt(input, minus);

    expect(change).toBeGreaterThan(0);
    expect(elasticity).toBeCloseTo(change / (1.0 - minus), 12);
    expect(elasticity).not.toBeCloseTo(change / (2 * 0.05), 6);
  });
});
