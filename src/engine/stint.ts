/**
 * Stint Simulation and Strategy Grid Search
 *
 * Cheap, deterministic strategy selection:
 *   - findBestConstantDeploy: fixed deploy-level grid over one full stint
 *   - findBestPitStrategy:    1-stop / 2-stop sweep around stint midpoints
 *                             across every compound permutation
 *
 * Both keep the first strictly-cheaper candidate, so ties resolve toward the
 * earliest enumerated option. pit-dp.ts is the exact alternative.
 */

import { BATTERY, COMPOUND_ORDER, PIT_LOSS, STRATEGY_SEARCH } from './constants';
import { createStrategy } from './entities';
import { EnergyState } from './energy';
import { compoundLapTime, lapTime } from './physics';
import { TyreState } from './tyre';
import type { Car, Compound, Strategy, Track } from './types';

export interface StintResult {
  totalTime: number;
  lapTimes: number[];
  /** Battery charge after each lap */
  energyTrace: number[];
  /** Tyre age after each lap */
  tyreTrace: number[];
}

export interface StrategySearchResult {
  bestStrategy: Strategy;
  bestTime: number;
}

// ──────────────────────────────────────────────────────────
// simulateStint
// ──────────────────────────────────────────────────────────

/**
 * Run one constant-strategy stint: harvest, deploy, physics lap, tyre age.
 * Uses the base physics model (no compound scaling).
 */
export function simulateStint(
  track: Track,
  car: Car,
  strategy: Strategy,
  laps: number,
  initialCharge: number = BATTERY.capacity,
  maxCharge: number = BATTERY.capacity,
): StintResult {
  if (!Number.isInteger(laps) || laps < 1) {
    throw new Error('laps must be >= 1.');
  }

  const energy = new EnergyState(maxCharge, initialCharge);
  const tyre = new TyreState(0, car.tyreWearRate);
  const lapTimes: number[] = [];
  const energyTrace: number[] = [];
  const tyreTrace: number[] = [];
  let totalTime = 0;

  for (let i = 0; i < laps; i++) {
    energy.harvest(track.energyHarvestFactor * strategy.harvestLevel);
    const deployed = energy.deploy(strategy.deployLevel);
    const t = lapTime(track, car, tyre.age, deployed);
    lapTimes.push(t);
    totalTime += t;
    tyre.incrementAge();
    energyTrace.push(energy.currentCharge);
    tyreTrace.push(tyre.age);
  }

  return { totalTime, lapTimes, energyTrace, tyreTrace };
}

// ──────────────────────────────────────────────────────────
// findBestConstantDeploy
// ──────────────────────────────────────────────────────────

export function findBestConstantDeploy(track: Track, car: Car, laps: number): StrategySearchResult {
  let best: StrategySearchResult | null = null;

  for (const deployLevel of STRATEGY_SEARCH.deployCandidates) {
    const strategy = createStrategy({ deployLevel, harvestLevel: STRATEGY_SEARCH.harvestLevel });
    const { totalTime } = simulateStint(track, car, strategy, laps);
    if (best === null || totalTime < best.bestTime) {
      best = { bestStrategy: strategy, bestTime: totalTime };
    }
  }

  if (best === null) {
    throw new Error('deploy candidate grid is empty');
  }
  return best;
}

// ──────────────────────────────────────────────────────────
// findBestPitStrategy
// ──────────────────────────────────────────────────────────

/** Total time of one stint on a single compound, starting on fresh tyres. */
function compoundStintTime(
  track: Track,
  car: Car,
  laps: number,
  compound: Compound,
  deployLevel: number,
  harvestLevel: number,
): number {
  const energy = new EnergyState();
  let total = 0;
  for (let age = 0; age < laps; age++) {
    energy.harvest(track.energyHarvestFactor * harvestLevel);
    const deployed = energy.deploy(deployLevel);
    total += compoundLapTime(track, car, age, compound, deployed);
  }
  return total;
}

/** Every ordered selection (with repetition) of `length` compounds. */
function compoundSequences(length: number): Compound[][] {
  if (length === 0) return [[]];
  const shorter = compoundSequences(length - 1);
  const result: Compound[][] = [];
  for (const first of COMPOUND_ORDER) {
    for (const rest of shorter) {
      result.push([first, ...rest]);
    }
  }
  return result;
}

interface PitCandidate {
  compounds: Compound[];
  pitLaps: number[];
  time: number;
}

/** Cheapest compound sequence for a fixed pit schedule (first found wins ties). */
function bestForSchedule(
  pitLaps: number[],
  totalLaps: number,
  pitLoss: number,
  stintTime: (laps: number, compound: Compound) => number,
): PitCandidate {
  const boundaries = [0, ...pitLaps, totalLaps];
  let best: PitCandidate | null = null;
  for (const compounds of compoundSequences(pitLaps.length + 1)) {
    let time = 0;
    for (let s = 0; s < compounds.length; s++) {
      time += stintTime(boundaries[s + 1] - boundaries[s], compounds[s]);
    }
    time += pitLoss * pitLaps.length;
    if (best === null || time < best.time) {
      best = { compounds, pitLaps, time };
    }
  }
  if (best === null) {
    throw new Error('compound enumeration is empty');
  }
  return best;
}

function offsets(): number[] {
  const window = STRATEGY_SEARCH.pitWindow;
  const result: number[] = [];
  for (let off = -window; off <= window; off++) result.push(off);
  return result;
}

/**
 * Search a limited grid of 1-stop and 2-stop plans.
 *
 * Deploy/harvest levels come from findBestConstantDeploy. Each stint is
 * costed from zero tyre age; every stop adds `pitLoss`.
 */
export function findBestPitStrategy(
  track: Track,
  car: Car,
  totalLaps: number,
  pitLoss: number = PIT_LOSS,
): StrategySearchResult {
  if (!Number.isInteger(totalLaps) || totalLaps < 3) {
    throw new Error('totalLaps must be >= 3 for a pit-stop search.');
  }

  const { bestStrategy: deployPlan } = findBestConstantDeploy(track, car, totalLaps);
  const { deployLevel, harvestLevel } = deployPlan;
  const stintTime = (laps: number, compound: Compound): number =>
    compoundStintTime(track, car, laps, compound, deployLevel, harvestLevel);

  let best: PitCandidate | null = null;
  const consider = (pitLaps: number[]): void => {
    const candidate = bestForSchedule(pitLaps, totalLaps, pitLoss, stintTime);
    if (best === null || candidate.time < best.time) best = candidate;
  };

  // 1-stop around the race midpoint
  const oneStopBase = Math.max(2, Math.min(totalLaps - 1, Math.floor(totalLaps / 2)));
  for (const off of offsets()) {
    const lap = oneStopBase + off;
    if (lap < 2 || lap >= totalLaps) continue;
    consider([lap]);
  }

  // 2-stop around the thirds
  const firstBase = Math.max(2, Math.floor(totalLaps / 3));
  const secondBase = Math.max(firstBase + 1, Math.floor((2 * totalLaps) / 3));
  for (const off1 of offsets()) {
    for (const off2 of offsets()) {
      const p1 = firstBase + off1;
      const p2 = secondBase + off2;
      if (p1 < 2 || p2 <= p1 || p2 >= totalLaps) continue;
      consider([p1, p2]);
    }
  }

  return toSearchResult(best, totalLaps, deployLevel, harvestLevel);
}

function toSearchResult(
  best: PitCandidate | null,
  totalLaps: number,
  deployLevel: number,
  harvestLevel: number,
): StrategySearchResult {
  if (best === null) {
    throw new Error(`no pit strategy candidates for ${totalLaps} laps`);
  }
  return {
    bestStrategy: createStrategy({
      deployLevel,
      harvestLevel,
      compoundSequence: best.compounds,
      pitLaps: best.pitLaps,
    }),
    bestTime: best.time,
  };
}
