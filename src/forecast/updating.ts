/**
 * Heuristic performance updater: a gradient-free alternative to the Kalman
 * calibrator. The points error (observed - expected) nudges each parameter
 * by learningRate * error * coefficient.
 */

import { createCar } from '../engine/entities';
import type { Car } from '../engine/types';

export interface PerformanceState {
  readonly baseSpeed: number;
  readonly ersEfficiency: number;
  readonly reliability: number;
}

export const DEFAULT_LEARNING_RATE = 0.05;

/** Per-parameter step coefficients. A positive error means a faster car. */
export const UPDATE_COEFFICIENTS = {
  baseSpeed: 0.01,
  ersEfficiency: 0.005,
  reliability: 0.001,
} as const;

function clampUnit(value: number): number {
  return Math.min(1.0, Math.max(0.0, value));
}

export function performanceStateOf(car: Car): PerformanceState {
  return { baseSpeed: car.baseSpeed, ersEfficiency: car.ersEfficiency, reliability: car.reliability };
}

export function updatePerformanceState(
  prior: PerformanceState,
  observedPoints: number,
  expectedPoints: number,
  learningRate: number = DEFAULT_LEARNING_RATE,
): PerformanceState {
  const step = learningRate * (observedPoints - expectedPoints);
  return {
    baseSpeed: prior.baseSpeed - step * UPDATE_COEFFICIENTS.baseSpeed,
    ersEfficiency: clampUnit(prior.ersEfficiency + step * UPDATE_COEFFICIENTS.ersEfficiency),
    reliability: clampUnit(prior.reliability + step * UPDATE_COEFFICIENTS.reliability),
  };
}

/** New car with the state's parameters; team name, aero and tyre wear carried over. */
export function applyUpdatedState(car: Car, state: PerformanceState): Car {
  return createCar({ ...car, ...state });
}
