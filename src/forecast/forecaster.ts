/**
 * ChampionshipForecaster: stateful wrapper around the forecast modules.
 *
 * Owns one calendar, the current field and a config. Batch forecasts read
 * the field as it stands; calibrate() folds an observed result into a
 * per-team Kalman belief and swaps the posterior car into the field, so later
 * forecasts see it. Every call is seeded from the config and replayable.
 */

import { getCalendar } from '../calendars/registry';
import type { CalendarInfo } from '../calendars/registry';
import type { Team, Track } from '../engine/types';
import { formatProbability } from '../utils/format';
import type { ForecastConfig } from './forecast-config';
import { DEFAULT_FORECAST_CONFIG } from './forecast-config';
import { indexField } from './field';
import { applyKalmanStateToTeam, initializeKalmanState, kalmanUpdate, predictDriverPoints } from './kalman';
import type { KalmanPerformanceState, KalmanUpdateOptions } from './kalman';
import { simulateRaceMonteCarlo } from './monte-carlo';
import type { RaceForecast } from './monte-carlo';
import { simulateSeasonMonteCarlo } from './season';
import type { SeasonForecast } from './season';
import { computeChampionshipEntropy, computeParameterSensitivity } from './sensitivity';
import type { SensitivityParameter } from './sensitivity';

export interface SensitivityReport {
  parameter: SensitivityParameter;
  teamName: string;
  driverName: string;
  /** d P(WDC) / d parameter */
  elasticity: number;
  /** Entropy of the WDC distribution at the unperturbed field */
  entropy: number;
}

export interface CalibrationStep {
  teamName: string;
  driverName: string;
  observedPoints: number;
  expectedPoints: number;
  prior: KalmanPerformanceState;
  posterior: KalmanPerformanceState;
}

export class ChampionshipForecaster {
  private readonly calendarInfo: CalendarInfo;
  private readonly config: ForecastConfig;
  private field: Team[];
  private readonly beliefs = new Map<string, KalmanPerformanceState>();

  constructor(
    calendar: string | CalendarInfo,
    teams: readonly Team[],
    config: ForecastConfig = DEFAULT_FORECAST_CONFIG,
  ) {
    this.calendarInfo = typeof calendar === 'string' ? getCalendar(calendar) : calendar;
    indexField(teams);
    this.field = [...teams];
    this.config = config;
  }

  get calendar(): readonly Track[] { return this.calendarInfo.tracks; }

  get teams(): readonly Team[] { return this.field; }

  /** Current Kalman belief for a team, if it has been calibrated. */
  belief(teamName: string): KalmanPerformanceState | undefined {
    return this.beliefs.get(teamName);
  }

  forecastRace(trackName: string): RaceForecast {
    const track = this.calendarInfo.tracks.find((t) => t.name === trackName);
    if (!track) {
      throw new Error(`Unknown round "${trackName}" in calendar "${this.calendarInfo.id}"`);
    }
    const { race, monteCarlo } = this.config;
    console.log(`[forecast] Race ${track.name}: ${monteCarlo.simulations} simulations x ${race.lapsPerRace} laps`);
    return simulateRaceMonteCarlo(track, this.field, race.lapsPerRace, monteCarlo.simulations, {
      baseSeed: monteCarlo.raceBaseSeed,
      noiseStd: race.noiseStd,
    });
  }

  forecastSeason(): SeasonForecast {
    const { race, monteCarlo } = this.config;
    console.log(
      `[forecast] Season ${this.calendarInfo.id}: ${monteCarlo.seasons} seasons x ${this.calendar.length} rounds`,
    );
    return simulateSeasonMonteCarlo(this.calendar, this.field, race.lapsPerRace, monteCarlo.seasons, {
      baseSeed: monteCarlo.baseSeed,
      noiseStd: race.noiseStd,
    });
  }

  sensitivity(parameter: SensitivityParameter, teamName: string, driverName: string): SensitivityReport {
    const team = this.findTeam(teamName);
    requireDriver(team, driverName);
    const { race, monteCarlo, sensitivity } = this.config;
    const elasticity = computeParameterSensitivity(parameter, {
      calendar: this.calendar,
      team,
      otherTeams: this.otherTeams(teamName),
      driverName,
      lapsPerRace: race.lapsPerRace,
      seasons: monteCarlo.seasons,
      delta: sensitivity.delta,
      baseSeed: sensitivity.baseSeed,
      noiseStd: race.noiseStd,
    });
    const baseline = simulateSeasonMonteCarlo(this.calendar, this.field, race.lapsPerRace, monteCarlo.seasons, {
      baseSeed: sensitivity.baseSeed,
      noiseStd: race.noiseStd,
    });
    const entropy = computeChampionshipEntropy(baseline.wdcProbabilities);
    console.log(`[forecast] Sensitivity ${teamName}/${parameter}: ${elasticity.toFixed(4)} (entropy ${entropy.toFixed(3)})`);
    return { parameter, teamName, driverName, elasticity, entropy };
  }

  /**
   * Fuse one observed points total for `driverName` into the team's belief.
   * Without `expectedPoints` the prediction at the current belief is used.
   */
  calibrate(teamName: string, driverName: string, observedPoints: number, expectedPoints?: number): CalibrationStep {
    const team = this.findTeam(teamName);
    requireDriver(team, driverName);

    const prior = this.beliefs.get(teamName) ?? initializeKalmanState(team.car);
    const { race, monteCarlo, kalman } = this.config;
    const options: KalmanUpdateOptions = {
      calendar: this.calendar,
      otherTeams: this.otherTeams(teamName),
      lapsPerRace: race.lapsPerRace,
      baseSeed: monteCarlo.baseSeed,
      seasons: kalman.gradientSeasons,
      delta: kalman.gradientDelta,
      noiseStd: race.noiseStd,
      measurementVariance: kalman.measurementVariance,
    };

    const expected = expectedPoints ?? predictDriverPoints(prior, team, driverName, options);
    const posterior = kalmanUpdate(prior, team, driverName, observedPoints, expected, options);

    this.beliefs.set(teamName, posterior);
    this.field = this.field.map((t) => (t.name === teamName ? applyKalmanStateToTeam(posterior, t) : t));

    console.log(
      `[forecast] Calibrated ${teamName} from ${driverName}: observed ${observedPoints}, expected ${expected.toFixed(1)}`,
    );
    return { teamName, driverName, observedPoints, expectedPoints: expected, prior, posterior };
  }

  /** Ranked report lines for the top `top` drivers and teams. */
  summarize(forecast: SeasonForecast, top = 10): string[] {
    const rank = (probabilities: Record<string, number>): string[] =>
      Object.keys(probabilities).sort((a, b) => probabilities[b] - probabilities[a]).slice(0, top);

    const lines: string[] = ['WDC'];
    rank(forecast.wdcProbabilities).forEach((name, i) => {
      lines.push(
        `${String(i + 1).padStart(2)}. ${name.padEnd(30)} ${formatProbability(forecast.wdcProbabilities[name]).padStart(6)}  E[pts] ${forecast.expectedDriverPoints[name].toFixed(1)}`,
      );
    });
    lines.push('WCC');
    rank(forecast.wccProbabilities).forEach((name, i) => {
      lines.push(
        `${String(i + 1).padStart(2)}. ${name.padEnd(30)} ${formatProbability(forecast.wccProbabilities[name]).padStart(6)}  E[pts] ${forecast.expectedTeamPoints[name].toFixed(1)}`,
      );
    });
    console.log(`[forecast] Summary of ${lines.length - 2} entries`);
    return lines;
  }

  private findTeam(teamName: string): Team {
    const team = this.field.find((t) => t.name === teamName);
    if (!team) {
      throw new Error(`Unknown team "${teamName}". Available: ${this.field.map((t) => t.name).join(', ')}`);
    }
    return team;
  }

  private otherTeams(teamName: string): Team[] {
    return this.field.filter((t) => t.name !== teamName);
  }
}

function requireDriver(team: Team, driverName: string): void {
  if (!team.drivers.some((d) => d.name === driverName)) {
    throw new Error(`Driver "${driverName}" does not drive for "${team.name}"`);
  }
}
