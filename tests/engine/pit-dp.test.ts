import { describe, it, expect } from 'vitest';
import { createStrategy } from '../../src/engine/entities';
import { compoundLapTime } from '../../src/engine/physics';
import { computeOptimalStrategyDp, evaluateStrategyCost } from '../../src/engine/pit-dp';
import { Compound } from '../../src/engine/types';
import { makeCar, makeTrack } from '../helpers/fixtures';

const car = makeCar('Alpha');

describe('computeOptimalStrategyDp', () => {
  const heavyWear = makeTrack({ tyreDegradationFactor: 0.4 });

  it('stops at least once when tyres fall away quickly', () => {
    const { strategy } = computeOptimalStrategyDp(heavyWear, car, 20);
    expect(strategy.pitLaps.length).toBeGreaterThanOrEqual(1);
    expect(strategy.compoundSequence[0]).toBe(Compound.Medium);
    expect(strategy.compoundSequence).toHaveLength(strategy.pitLaps.length + 1);
  });

  it('keeps every stop away from the first and last lap', () => {
    const { strategy } = computeOptimalStrategyDp(heavyWear, car, 20);
    for (const lap of strategy.pitLaps) {
      expect(lap).toBeGreaterThanOrEqual(1);
      expect(lap).toBeLessThanOrEqual(18);
    }
  });

  it('reports a total that replays under the same cost model', () => {
    const { strategy, totalTime } = computeOptimalStrategyDp(heavyWear, car, 20);
    expect(evaluateStrategyCost(heavyWear, car, strategy, 20)).toBeCloseTo(totalTime, 6);
  });

  it('beats both the no-stop plan and a hand-picked one-stop plan', () => {
    const { totalTime } = computeOptimalStrategyDp(heavyWear, car, 20);
    const noStop = createStrategy({ deployLevel: 0, harvestLevel: 0 });
    const oneStop = createStrategy({
      deployLevel: 0,
      harvestLevel: 0,
      compoundSequence: [Compound.Medium, Compound.Medium],
      pitLaps: [10],
    });
    expect(totalTime).toBeLessThan(evaluateStrategyCost(heavyWear, car, noStop, 20));
    expect(totalTime).toBeLessThanOrEqual(evaluateStrategyCost(heavyWear, car, oneStop, 20) + 1e-9);
  });

  it('never stops when the tyres do not wear', () => {
    const flat = makeTrack({ tyreDegradationFactor: 0 });
    const { strategy, totalTime } = computeOptimalStrategyDp(flat, car, 20);
    expect(strategy.pitLaps).toEqual([]);
    expect(strategy.compoundSequence).toEqual([Compound.Medium]);
    expect(totalTime).toBeCloseTo(20 * compoundLapTime(flat, car, 0, Compound.Medium, 0), 6);
  });

  it('honours the starting compound', () => {
    const flat = makeTrack({ tyreDegradationFactor: 0 });
    const { strategy } = computeOptimalStrategyDp(flat, car, 5, Compound.Hard);
    expect(strategy.compoundSequence).toEqual([Compound.Hard]);
  });

  it('rejects a race without laps', () => {
    expect(() => computeOptimalStrategyDp(heavyWear, car, 0)).toThrow('total_laps must be >= 1.');
  });
});

describe('evaluateStrategyCost', () => {
  it('adds the pit loss and restarts tyre age after the stop', () => {
    const track = makeTrack();
    const strategy = createStrategy({
      deployLevel: 0,
      harvestLevel: 0,
      compoundSequence: [Compound.Medium, Compound.Soft],
      pitLaps: [2],
    });
    let expected = 0;
    expected += compoundLapTime(track, car, 0, Compound.Medium, 0);
    expected += compoundLapTime(track, car, 1, Compound.Medium, 0);
    expected += 20;
    expected += compoundLapTime(track, car, 0, Compound.Soft, 0);
    expect(evaluateStrategyCost(track, car, strategy, 3)).toBe(expected);
  });
});
