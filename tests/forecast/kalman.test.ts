import { afterEach, describe, it, expect, vi } from 'vitest';
import { diag3, trace3, vec3 } from '../../src/engine/linalg';
import {
  INITIAL_VARIANCES,
  applyKalmanStateToTeam,
  computeMeasurementGradient,
  initializeKalmanState,
  kalmanUpdate,
  kalmanUpdateWithJacobian,
  predictDriverPoints,
} from '../../src/forecast/kalman';
import type { KalmanPerformanceState, MeasurementModel } from '../../src/forecast/kalman';
import { makeCar, makeTeam, makeTrack } from '../helpers/fixtures';

function stateAt(theta: readonly [number, number, number]): KalmanPerformanceState {
  return { theta, covariance: diag3(0.1, 0.05, 0.01) };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('initializeKalmanState', () => {
  it('starts from the car with the prior variances on the diagonal', () => {
    const state = initializeKalmanState(makeCar('A', { baseSpeed: 80, ersEfficiency: 0.8, reliability: 0.95 }));
    expect(state.theta).toEqual([80, 0.8, 0.95]);
    expect(state.covariance).toEqual(diag3(...INITIAL_VARIANCES));
  });
});

describe('kalmanUpdateWithJacobian', () => {
  it('moves theta along the gain and shrinks the observed variance', () => {
    const next = kalmanUpdateWithJacobian(stateAt([80, 0.8, 0.95]), vec3(1, 0, 0), 2, 0.1);
    expect(next.theta[0]).toBeCloseTo(81, 12);
    expect(next.theta[1]).toBe(0.8);
    expect(next.theta[2]).toBe(0.95);
    expect(next.covariance[0][0]).toBeCloseTo(0.05, 12);
    expect(next.covariance[1][1]).toBeCloseTo(0.05, 12);
    expect(next.covariance[2][2]).toBeCloseTo(0.01, 12);
  });

  it('never increases the covariance trace', () => {
    const prior = stateAt([80, 0.8, 0.95]);
    const next = kalmanUpdateWithJacobian(prior, vec3(1, 2, 3), -4, 10);
    expect(trace3(next.covariance)).toBeLessThanOrEqual(trace3(prior.covariance));
  });

  it('clamps ers efficiency and reliability to [0, 1]', () => {
    const next = kalmanUpdateWithJacobian(stateAt([80, 0.99, 0.995]), vec3(0, 100, 100), 100, 10);
    expect(next.theta[0]).toBe(80);
    expect(next.theta[1]).toBe(1);
    expect(next.theta[2]).toBe(1);
  });

  it('keeps the prior on a degenerate innovation covariance', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const prior = stateAt([80, 0.8, 0.95]);
    const next = kalmanUpdateWithJacobian(prior, vec3(0, 0, 0), 5, 0);
    expect(next).toBe(prior);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('measurement model', () => {
  const team = makeTeam('A', { baseSpeed: 75 });
  const model: MeasurementModel = {
    calendar: [makeTrack()],
    otherTeams: [makeTeam('B', { baseSpeed: 85 })],
    lapsPerRace: 5,
    baseSeed: 100,
    seasons: 5,
    noiseStd: 0,
  };

  it('predicts the points of a certain winner', () => {
    expect(predictDriverPoints(initializeKalmanState(team.car), team, 'A1', model)).toBeCloseTo(25, 9);
  });

  it('finds no pace or ERS sensitivity when the result cannot change', () => {
    const h = computeMeasurementGradient(team, 'A1', initializeKalmanState(team.car).theta, model);
    expect(h[0]).toBe(0);
    expect(h[1]).toBe(0);
  });

  it('leaves theta in place when the observation matches the prediction', () => {
    const prior = initializeKalmanState(team.car);
    const posterior = kalmanUpdate(prior, team, 'A1', 25, 25, model);
    expect(posterior.theta).toEqual(prior.theta);
    expect(trace3(posterior.covariance)).toBeLessThanOrEqual(trace3(prior.covariance));
  });
});

describe('measurement gradient in a contested field', () => {
  const team = makeTeam('A', { reliability: 0.97 }, 0.05);
  const model: MeasurementModel = {
    calendar: [makeTrack({ name: 'Ring One' }), makeTrack({ name: 'Ring Two' })],
    otherTeams: [makeTeam('B', { reliability: 0.97 }, 0.05)],
    lapsPerRace: 10,
    baseSeed: 100,
    seasons: 100,
    delta: 0.02,
    noiseStd: 0.3,
  };

  it('credits a more reliable car with more points', () => {
    const theta = initializeKalmanState(team.car).theta;
    const h = computeMeasurementGradient(team, 'A1', theta, model);

    const at = (reliability: number): number =>
      predictDriverPoints(
        { theta: vec3(theta[0], theta[1], reliability), covariance: diag3(...INITIAL_VARIANCES) },
        team,
        'A1',
        model,
      );
    expect(h[2]).toBeGreaterThan(0);
    expect(h[2]).toBeCloseTo((at(theta[2] + 0.02) - at(theta[2] - 0.02)) / (2 * 0.02), 9);
  });
});

describe('applyKalmanStateToTeam', () => {
  it('writes the clamped belief into the car and keeps the other fields', () => {
    const team = makeTeam('A', { aeroEfficiency: 0.9, tyreWearRate: 1.2 });
    const updated = applyKalmanStateToTeam(stateAt([79.5, 1.3, -0.2]), team);
    expect(updated.car).toEqual({
      teamName: 'A',
      baseSpeed: 79.5,
      ersEfficiency: 1,
      aeroEfficiency: 0.9,
      tyreWearRate: 1.2,
      reliability: 0,
    });
    expect(updated.drivers).toEqual(team.drivers);
  });
});
