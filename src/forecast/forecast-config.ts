/**
 * Forecast Configuration: types and default knobs.
 *
 * Replication counts, seeds and calibrator tuning for the forecast layer.
 * Engine-level model constants live in engine/constants.ts.
 */

export interface RaceConfig {
  lapsPerRace: number;
  /** Base lap-time noise (seconds) passed to every simulated race */
  noiseStd: number;
}

export interface MonteCarloConfig {
  /** Season replications per forecast */
  seasons: number;
  /** Race replications per single-race forecast */
  simulations: number;
  /** Season base seed */
  baseSeed: number;
  /** Race base seed; replication i uses raceBaseSeed + i */
  raceBaseSeed: number;
}

export interface KalmanConfig {
  /** Observation noise variance R (points^2) */
  measurementVariance: number;
  /** Season replications per Jacobian evaluation */
  gradientSeasons: number;
  /** Central-difference step */
  gradientDelta: number;
}

export interface SensitivityConfig {
  delta: number;
  baseSeed: number;
}

export interface ForecastConfig {
  race: RaceConfig;
  monteCarlo: MonteCarloConfig;
  kalman: KalmanConfig;
  sensitivity: SensitivityConfig;
}

export const DEFAULT_FORECAST_CONFIG = {
  race: {
    lapsPerRace: 50,
    noiseStd: 0.05,
  },
  monteCarlo: {
    seasons: 500,
    simulations: 1000,
    baseSeed: 100,
    raceBaseSeed: 42,
  },
  kalman: {
    measurementVariance: 10.0,
    gradientSeasons: 100,
    gradientDelta: 1e-3,
  },
  sensitivity: {
    delta: 0.01,
    baseSeed: 200,
  },
} as const satisfies ForecastConfig;

/** Partial overrides, one level deep. */
export type ForecastConfigOverrides = {
  [K in keyof ForecastConfig]?: Partial<ForecastConfig[K]>;
};

export function resolveForecastConfig(overrides: ForecastConfigOverrides = {}): ForecastConfig {
  return {
    race: { ...DEFAULT_FORECAST_CONFIG.race, ...overrides.race },
    monteCarlo: { ...DEFAULT_FORECAST_CONFIG.monteCarlo, ...overrides.monteCarlo },
    kalman: { ...DEFAULT_FORECAST_CONFIG.kalman, ...overrides.kalman },
    sensitivity: { ...DEFAULT_FORECAST_CONFIG.sensitivity, ...overrides.sensitivity },
  };
}
