/**
 * Season-Level Monte Carlo
 *
 * Each replication runs every calendar round in order with
 *
 *   raceSeed = (baseSeed + seasonIndex) + raceIndex * 1000
 *
 * so no race seed repeats within or across seasons (for fewer than 1000
 * seasons). Driver points decide the WDC; both drivers' points summed per
 * team decide the WCC. Equal points keep grid order.
 */

import { pointsForPosition } from '../engine/constants';
import { simulateRace } from '../engine/race';
import type { Strategy, Team, Track } from '../engine/types';
import { indexField, normalizeHistogram, requirePositiveInteger, zeroRecord } from './field';

export interface SeasonForecast {
  wdcProbabilities: Record<string, number>;
  wccProbabilities: Record<string, number>;
  expectedDriverPoints: Record<string, number>;
  expectedTeamPoints: Record<string, number>;
  driverStandingsDistribution: Record<string, Record<number, number>>;
  teamStandingsDistribution: Record<string, Record<number, number>>;
}

export interface SeasonOptions {
  /** Default 100 */
  baseSeed?: number;
  noiseStd?: number;
  strategies?: Readonly<Record<string, Strategy>>;
}

export const DEFAULT_SEASON_BASE_SEED = 100;
/** Seed stride between rounds of one season. */
export const RACE_SEED_STRIDE = 1000;

export function raceSeed(baseSeed: number, seasonIndex: number, raceIndex: number): number {
  return baseSeed + seasonIndex + raceIndex * RACE_SEED_STRIDE;
}

/** Accumulates one championship (drivers or constructors) across seasons. */
class StandingsTally {
  private readonly championCounts: Record<string, number>;
  private readonly pointsSums: Record<string, number>;
  private readonly histograms = new Map<string, Map<number, number>>();

  constructor(private readonly names: readonly string[]) {
    this.championCounts = zeroRecord(names);
    this.pointsSums = zeroRecord(names);
    for (const name of names) this.histograms.set(name, new Map<number, number>());
  }

  /** Rank one season's totals (descending, stable) and record it. */
  record(seasonPoints: Record<string, number>): void {
    const ranked = [...this.names].sort((a, b) => seasonPoints[b] - seasonPoints[a]);
    this.championCounts[ranked[0]] += 1;
    ranked.forEach((name, index) => {
      this.pointsSums[name] += seasonPoints[name];
      const histogram = this.histograms.get(name);
      if (histogram) histogram.set(index + 1, (histogram.get(index + 1) ?? 0) + 1);
    });
  }

  finish(seasons: number): {
    probabilities: Record<string, number>;
    expectedPoints: Record<string, number>;
    distribution: Record<string, Record<number, number>>;
  } {
    const inv = 1.0 / seasons;
    const probabilities: Record<string, number> = {};
    const expectedPoints: Record<string, number> = {};
    const distribution: Record<string, Record<number, number>> = {};
    for (const name of this.names) {
      probabilities[name] = this.championCounts[name] * inv;
      expectedPoints[name] = this.pointsSums[name] * inv;
      distribution[name] = normalizeHistogram(
        this.histograms.get(name) ?? new Map<number, number>(),
        inv,
      );
    }
    return { probabilities, expectedPoints, distribution };
  }
}

export function simulateSeasonMonteCarlo(
  calendar: readonly Track[],
  teams: readonly Team[],
  lapsPerRace: number,
  seasons: number,
  options: SeasonOptions = {},
): SeasonForecast {
  requirePositiveInteger('seasons', seasons);
  requirePositiveInteger('laps_per_race', lapsPerRace);
  if (calendar.length === 0) {
    throw new Error('calendar must not be empty.');
  }
  const { driverNames, teamNames, driverToTeam } = indexField(teams);
  const baseSeed = options.baseSeed ?? DEFAULT_SEASON_BASE_SEED;

  const drivers = new StandingsTally(driverNames);
  const constructors = new StandingsTally(teamNames);

  for (let seasonIndex = 0; seasonIndex < seasons; seasonIndex++) {
    const driverPoints = zeroRecord(driverNames);
    const teamPoints = zeroRecord(teamNames);

    calendar.forEach((track, raceIndex) => {
      const result = simulateRace(track, teams, lapsPerRace, {
        seed: raceSeed(baseSeed, seasonIndex, raceIndex),
        noiseStd: options.noiseStd,
        strategies: options.strategies,
      });
      result.finalClassification.forEach((name, index) => {
        const points = pointsForPosition(index);
        if (points === 0) return;
        driverPoints[name] += points;
        const teamName = driverToTeam.get(name);
        if (teamName !== undefined) teamPoints[teamName] += points;
      });
    });

    drivers.record(driverPoints);
    constructors.record(teamPoints);
  }

  const wdc = drivers.finish(seasons);
  const wcc = constructors.finish(seasons);
  return {
    wdcProbabilities: wdc.probabilities,
    wccProbabilities: wcc.probabilities,
    expectedDriverPoints: wdc.expectedPoints,
    expectedTeamPoints: wcc.expectedPoints,
    driverStandingsDistribution: wdc.distribution,
    teamStandingsDistribution: wcc.distribution,
  };
}
