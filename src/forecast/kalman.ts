/**
 * Kalman Calibrator (noisy-Jacobian EKF)
 *
 * Belief over a car's latent profile theta = [baseSpeed, ersEfficiency,
 * reliability] with a 3x3 covariance P. The observation is a driver's season
 * points; its model h(theta) is the season Monte Carlo's expected points, so
 * the Jacobian H comes from seeded central differences. Each partial is
 * itself a Monte Carlo estimate: H is approximate even though every
 * evaluation is reproducible.
 *
 * Update:
 *   y = observed - expected
 *   S = H P Hᵀ + R
 *   K = P Hᵀ / S
 *   theta' = theta + K y        (ers, reliability clamped to [0, 1])
 *   P'     = (I - K H) P
 *
 * |S| < 1e-15 returns the prior unchanged.
 */

import { withCar } from '../engine/entities';
import {
  IDENTITY3,
  addVec,
  diag3,
  dot3,
  mulMat,
  mulMatVec,
  outer3,
  scaleVec,
  subMat,
  vec3,
} from '../engine/linalg';
import type { Mat3, Vec3 } from '../engine/linalg';
import type { Car, Team, Track } from '../engine/types';
import { simulateSeasonMonteCarlo } from './season';

export interface KalmanPerformanceState {
  /** [baseSpeed, ersEfficiency, reliability] */
  readonly theta: Vec3;
  readonly covariance: Mat3;
}

/** Prior variances for baseSpeed, ersEfficiency, reliability. */
export const INITIAL_VARIANCES: Vec3 = [0.1, 0.05, 0.01];

const DEGENERATE_S = 1e-15;

export const DEFAULT_MEASUREMENT_VARIANCE = 10.0;
export const DEFAULT_GRADIENT_SEASONS = 100;
export const DEFAULT_GRADIENT_DELTA = 1e-3;

export function initializeKalmanState(car: Car): KalmanPerformanceState {
  return {
    theta: vec3(car.baseSpeed, car.ersEfficiency, car.reliability),
    covariance: diag3(...INITIAL_VARIANCES),
  };
}

function clampUnit(value: number): number {
  return Math.min(1.0, Math.max(0.0, value));
}

/** Team whose car carries theta (ers/reliability clamped, other fields kept). */
function teamAt(team: Team, theta: Vec3): Team {
  return withCar(team, {
    ...team.car,
    baseSpeed: theta[0],
    ersEfficiency: clampUnit(theta[1]),
    reliability: clampUnit(theta[2]),
  });
}

// ──────────────────────────────────────────────────────────
// Observation model
// ──────────────────────────────────────────────────────────

/** Everything the season Monte Carlo needs besides the perturbed team. */
export interface MeasurementModel {
  calendar: readonly Track[];
  otherTeams: readonly Team[];
  lapsPerRace: number;
  baseSeed: number;
  /** Season replications per evaluation. Default 100 */
  seasons?: number;
  /** Central-difference step. Default 1e-3 */
  delta?: number;
  noiseStd?: number;
}

function expectedPointsAt(team: Team, theta: Vec3, driverName: string, model: MeasurementModel): number {
  const forecast = simulateSeasonMonteCarlo(
    model.calendar,
    [teamAt(team, theta), ...model.otherTeams],
    model.lapsPerRace,
    model.seasons ?? DEFAULT_GRADIENT_SEASONS,
    { baseSeed: model.baseSeed, noiseStd: model.noiseStd },
  );
  return forecast.expectedDriverPoints[driverName] ?? 0.0;
}

/** h(theta): the driver's expected season points at the current belief. */
export function predictDriverPoints(
  state: KalmanPerformanceState,
  team: Team,
  driverName: string,
  model: MeasurementModel,
): number {
  return expectedPointsAt(team, state.theta, driverName, model);
}

/** Central-difference H = dh/dtheta, evaluated at `theta`. */
export function computeMeasurementGradient(
  team: Team,
  driverName: string,
  theta: Vec3,
  model: MeasurementModel,
): Vec3 {
  const delta = model.delta ?? DEFAULT_GRADIENT_DELTA;
  const partial = (axis: 0 | 1 | 2): number => {
    const step = vec3(axis === 0 ? delta : 0, axis === 1 ? delta : 0, axis === 2 ? delta : 0);
    const plus = expectedPointsAt(team, addVec(theta, step), driverName, model);
    const minus = expectedPointsAt(team, addVec(theta, scaleVec(step, -1)), driverName, model);
    return (plus - minus) / (2.0 * delta);
  };
  return vec3(partial(0), partial(1), partial(2));
}

// ──────────────────────────────────────────────────────────
// Update
// ──────────────────────────────────────────────────────────

/** Linear EKF step for a given Jacobian row `h` and innovation `y`. */
export function kalmanUpdateWithJacobian(
  state: KalmanPerformanceState,
  h: Vec3,
  innovation: number,
  measurementVariance: number,
): KalmanPerformanceState {
  const p = state.covariance;
  const ph = mulMatVec(p, h);
  const s = dot3(h, ph) + measurementVariance;

  if (!(Math.abs(s) >= DEGENERATE_S)) {
    console.warn(`[kalman] Degenerate innovation covariance (S=${s}); keeping prior state`);
    return state;
  }

  const gain = scaleVec(ph, 1.0 / s);
  const updated = addVec(state.theta, scaleVec(gain, innovation));
  const theta = vec3(updated[0], clampUnit(updated[1]), clampUnit(updated[2]));
  const covariance = mulMat(subMat(IDENTITY3, outer3(gain, h)), p);

  return { theta, covariance };
}

export interface KalmanUpdateOptions extends MeasurementModel {
  /** Default 10.0 */
  measurementVariance?: number;
}

/** One full EKF cycle: numerical Jacobian at the belief, then the linear step. */
export function kalmanUpdate(
  state: KalmanPerformanceState,
  team: Team,
  driverName: string,
  observedPoints: number,
  expectedPoints: number,
  options: KalmanUpdateOptions,
): KalmanPerformanceState {
  const innovation = observedPoints - expectedPoints;
  const h = computeMeasurementGradient(team, driverName, state.theta, options);
  return kalmanUpdateWithJacobian(
    state,
    h,
    innovation,
    options.measurementVariance ?? DEFAULT_MEASUREMENT_VARIANCE,
  );
}

/** Team whose car carries the state's belief; aero and tyre wear unchanged. */
export function applyKalmanStateToTeam(state: KalmanPerformanceState, team: Team): Team {
  return teamAt(team, state.theta);
}
