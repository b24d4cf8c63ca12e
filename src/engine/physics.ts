/**
 * Lap-Time Physics
 *
 * Deterministic cost primitive used by the stint search, the DP optimiser
 * and the race simulator:
 *
 *   lapTime = baseSpeed
 *           + downforceSensitivity * (1 - aeroEfficiency)
 *           + tyreAge * tyreDegradationFactor * tyreWearRate
 *           - deployLevel * ersEfficiency
 *
 * The terms are summed in exactly this order; callers rely on bit-identical
 * results for replay.
 */

import type { Car, Compound, Track } from './types';
import { getCompound } from './tyre';

export function lapTime(track: Track, car: Car, tyreAge: number, deployLevel: number): number {
  if (!(tyreAge >= 0)) {
    throw new Error('tyre_age must be >= 0.');
  }
  if (!(deployLevel >= 0 && deployLevel <= 1)) {
    throw new Error('deploy_level must be between 0.0 and 1.0.');
  }

  const base = car.baseSpeed;
  const aero = track.downforceSensitivity * (1.0 - car.aeroEfficiency);
  const tyre = tyreAge * track.tyreDegradationFactor * car.tyreWearRate;
  const ers = deployLevel * car.ersEfficiency;

  return base + aero + tyre - ers;
}

/**
 * Lap time on a specific compound: clean physics lap (age 0) plus the
 * compound-scaled degradation term and the compound pace delta.
 */
export function compoundLapTime(
  track: Track,
  car: Car,
  tyreAge: number,
  compound: Compound,
  deployLevel: number,
): number {
  const spec = getCompound(compound);
  let t = lapTime(track, car, 0, deployLevel);
  t += tyreAge * track.tyreDegradationFactor * car.tyreWearRate * spec.degradationRate;
  t += spec.basePaceDelta;
  return t;
}
