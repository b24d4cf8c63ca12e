/**
 * Race-Level Monte Carlo
 *
 * Repeats simulateRace with seed = baseSeed + i and turns the finishing
 * orders into per-driver probabilities and expectations. All outputs are
 * keyed by driver name, in grid order.
 */

import { pointsForPosition } from '../engine/constants';
import { simulateRace } from '../engine/race';
import type { Strategy, Team, Track } from '../engine/types';
import { indexField, normalizeHistogram, requirePositiveInteger, zeroRecord } from './field';

export interface RaceForecast {
  winnerProbabilities: Record<string, number>;
  podiumProbabilities: Record<string, number>;
  expectedPosition: Record<string, number>;
  expectedPoints: Record<string, number>;
  /** driver -> { position: probability }, positions ascending */
  finishDistribution: Record<string, Record<number, number>>;
}

export interface MonteCarloOptions {
  /** Replication i uses baseSeed + i. Default 42. */
  baseSeed?: number;
  noiseStd?: number;
  strategies?: Readonly<Record<string, Strategy>>;
}

export const DEFAULT_RACE_BASE_SEED = 42;

export function simulateRaceMonteCarlo(
  track: Track,
  teams: readonly Team[],
  laps: number,
  simulations: number,
  options: MonteCarloOptions = {},
): RaceForecast {
  requirePositiveInteger('simulations', simulations);
  requirePositiveInteger('laps', laps);
  const { driverNames } = indexField(teams);
  const baseSeed = options.baseSeed ?? DEFAULT_RACE_BASE_SEED;

  const wins = zeroRecord(driverNames);
  const podiums = zeroRecord(driverNames);
  const positionSums = zeroRecord(driverNames);
  const pointsSums = zeroRecord(driverNames);
  const histograms = new Map<string, Map<number, number>>(
    driverNames.map((name): [string, Map<number, number>] => [name, new Map<number, number>()]),
  );

  for (let i = 0; i < simulations; i++) {
    const result = simulateRace(track, teams, laps, {
      seed: baseSeed + i,
      noiseStd: options.noiseStd,
      strategies: options.strategies,
    });

    result.finalClassification.forEach((name, index) => {
      const position = index + 1;
      if (position === 1) wins[name] += 1;
      if (position <= 3) podiums[name] += 1;
      positionSums[name] += position;
      pointsSums[name] += pointsForPosition(index);
      const histogram = histograms.get(name);
      if (histogram) histogram.set(position, (histogram.get(position) ?? 0) + 1);
    });
  }

  const inv = 1.0 / simulations;
  const scale = (record: Record<string, number>): Record<string, number> => {
    const out: Record<string, number> = {};
    for (const name of driverNames) out[name] = record[name] * inv;
    return out;
  };

  const finishDistribution: Record<string, Record<number, number>> = {};
  for (const name of driverNames) {
    finishDistribution[name] = normalizeHistogram(histograms.get(name) ?? new Map<number, number>(), inv);
  }

  return {
    winnerProbabilities: scale(wins),
    podiumProbabilities: scale(podiums),
    expectedPosition: scale(positionSums),
    expectedPoints: scale(pointsSums),
    finishDistribution,
  };
}
