/**
 * Simulation Constants and Tuning Parameters
 *
 * All race-model tuning lives here. Other modules import these rather than
 * hard-coding numbers so the Monte Carlo, DP and grid-search layers agree
 * on the same cost model.
 */

import { Compound } from './types';
import type { TyreCompound } from './types';

/** Seconds added to cumulative time for every pit stop under green flag. */
export const PIT_LOSS = 20.0;

/** Default standard deviation of per-lap Gaussian noise (seconds). */
export const DEFAULT_NOISE_STD = 0.05;

/** ERS battery. */
export const BATTERY = {
  /** Capacity in MJ. Batteries start each race full. */
  capacity: 4.0,
} as const;

/** Overtake model between adjacent cars. */
export const OVERTAKE = {
  /** Cars closer than this (seconds) may attempt a pass */
  gapThreshold: 1.0,
  /** Seconds transferred between the pair on a successful pass */
  passTimeDelta: 0.2,
  /** Logistic steepness applied to lap-time delta * overtake coefficient */
  logisticSteepness: 3.0,
} as const;

/** Safety-car regime. */
export const SAFETY_CAR = {
  /** SC lap time = factor * fastest car's clean physics lap on the track */
  lapTimeFactor: 1.4,
  /** Gap (seconds) between consecutive cars after each SC lap */
  gapInterval: 0.2,
  /** Pit loss multiplier while the SC is out */
  pitMultiplier: 0.6,
} as const;

/** Championship points for positions 1-10. */
export const POINTS_TABLE: readonly number[] = [25, 18, 15, 12, 10, 8, 6, 4, 2, 1];

/** Compound registry. Indexed by the Compound enum. */
export const COMPOUNDS = {
  [Compound.Soft]: { name: Compound.Soft, basePaceDelta: -0.6, degradationRate: 1.5 },
  [Compound.Medium]: { name: Compound.Medium, basePaceDelta: -0.3, degradationRate: 1.0 },
  [Compound.Hard]: { name: Compound.Hard, basePaceDelta: 0.0, degradationRate: 0.7 },
} as const satisfies Record<Compound, TyreCompound>;

/** Enumeration order used by every search (ties resolve to the earliest). */
export const COMPOUND_ORDER: readonly Compound[] = [Compound.Soft, Compound.Medium, Compound.Hard];

/** Strategy grid search. */
export const STRATEGY_SEARCH = {
  /** Constant deploy levels tried, in tie-break order */
  deployCandidates: [0.0, 0.2, 0.4, 0.6, 0.8],
  /** Harvest level used by every deploy candidate */
  harvestLevel: 1.0,
  /** Pit laps are swept +/- this many laps around each midpoint */
  pitWindow: 5,
} as const;

/** Points for a 0-based finishing index (0 outside the points). */
export function pointsForPosition(positionIndex: number): number {
  return positionIndex < POINTS_TABLE.length ? POINTS_TABLE[positionIndex] : 0;
}
