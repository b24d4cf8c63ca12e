/**
 * Race Simulator: Per-Lap State Machine
 *
 * Runs one seeded replication of a race. Per lap:
 *   1. Safety-car controller draws this lap's regime transition
 *   2. For every active driver, in grid order:
 *        harvest -> deploy -> compound lap time + skill offset
 *        -> noise -> reliability hazard -> tyre age -> pit stop
 *   3. Under the safety car: re-space the field behind the leader
 *      Under green flag:     adjacent-pair overtakes
 *
 * Per-driver state is created fresh for every call and holds the shared
 * Car/Driver values by reference. All randomness flows through one Rng
 * built from `options.seed`, so equal inputs give bit-identical results.
 */

import { DEFAULT_NOISE_STD, OVERTAKE, PIT_LOSS } from './constants';
import { EnergyState } from './energy';
import { validateStrategy } from './entities';
import { compoundLapTime } from './physics';
import { createRng } from './rng';
import type { Rng } from './rng';
import { SafetyCarController, TrackPhase, compressGaps, pitLossFor, safetyCarLapTime } from './safety-car';
import { findBestConstantDeploy } from './stint';
import { TyreState } from './tyre';
import type { Car, Compound, Driver, RaceResult, Strategy, Team, Track } from './types';

export interface RaceOptions {
  /** Seed for this replication's Rng */
  seed: number;
  /** Base lap-time noise; each driver's std is noiseStd * consistency. 0 = deterministic */
  noiseStd?: number;
  /** Per-driver strategies by driver name. Missing drivers get the best constant-deploy plan. */
  strategies?: Readonly<Record<string, Strategy>>;
}

// ──────────────────────────────────────────────────────────
// Per-driver state
// ──────────────────────────────────────────────────────────

export interface DriverRaceState {
  readonly driver: Driver;
  readonly car: Car;
  readonly strategy: Strategy;
  readonly energy: EnergyState;
  readonly tyre: TyreState;
  cumulativeTime: number;
  lastLapTime: number;
  readonly lapTimes: number[];
  active: boolean;
  stintIndex: number;
}

export function createDriverRaceState(driver: Driver, car: Car, strategy: Strategy): DriverRaceState {
  return {
    driver,
    car,
    strategy,
    energy: new EnergyState(),
    tyre: new TyreState(0, car.tyreWearRate, strategy.compoundSequence[0]),
    cumulativeTime: 0,
    lastLapTime: 0,
    lapTimes: [],
    active: true,
    stintIndex: 0,
  };
}

// ──────────────────────────────────────────────────────────
// Overtakes
// ──────────────────────────────────────────────────────────

/**
 * Evaluate adjacent pairs of `ranked` (sorted by cumulative time) for a pass.
 *
 * Pairs closer than OVERTAKE.gapThreshold draw against
 * 1 / (1 + exp(-k * delta * overtakeCoefficient)), delta being the trailer's
 * last lap minus the leader's. A pass swaps the pair in place, moves the
 * trailer to leader - passTimeDelta (clamped at 0), pushes the leader back by
 * passTimeDelta and skips the next pair.
 */
export function applyOvertakes(ranked: DriverRaceState[], track: Track, rng: Rng): void {
  let i = 0;
  while (i < ranked.length - 1) {
    const leader = ranked[i];
    const trailer = ranked[i + 1];

    const gap = Math.abs(trailer.cumulativeTime - leader.cumulativeTime);
    if (gap < OVERTAKE.gapThreshold) {
      const delta = trailer.lastLapTime - leader.lastLapTime;
      const exponent = -OVERTAKE.logisticSteepness * delta * track.overtakeCoefficient;
      const passProbability = 1.0 / (1.0 + Math.exp(exponent));

      if (rng.next() < passProbability) {
        const leaderTime = leader.cumulativeTime;
        trailer.cumulativeTime = Math.max(0, leaderTime - OVERTAKE.passTimeDelta);
        leader.cumulativeTime = leaderTime + OVERTAKE.passTimeDelta;
        ranked[i] = trailer;
        ranked[i + 1] = leader;
        i += 2;
        continue;
      }
    }
    i += 1;
  }
}

// ──────────────────────────────────────────────────────────
// Lap step
// ──────────────────────────────────────────────────────────

/** Per-lap retirement probability for a car. */
export function hazardProbability(car: Car): number {
  return 1.0 - Math.exp(-(1.0 - car.reliability));
}

/** Advance one driver by one lap. Returns true when the driver retired this lap. */
function stepDriver(
  state: DriverRaceState,
  track: Track,
  lapNumber: number,
  phase: TrackPhase,
  scLapTime: number,
  noiseStd: number,
  rng: Rng,
): boolean {
  const { strategy, energy, tyre, car, driver } = state;

  energy.harvest(track.energyHarvestFactor * strategy.harvestLevel);
  const deployed = energy.deploy(strategy.deployLevel);

  let t: number;
  if (phase === TrackPhase.SafetyCar) {
    t = scLapTime;
  } else {
    t = compoundLapTime(track, car, tyre.age, tyre.compound, deployed);
    t += driver.skillOffset;
    if (noiseStd > 0) {
      t += rng.normal(0, noiseStd * driver.consistency);
    }
  }

  state.lastLapTime = t;
  state.cumulativeTime += t;
  state.lapTimes.push(t);

  let retired = false;
  if (rng.next() < hazardProbability(car)) {
    state.active = false;
    retired = true;
  }

  tyre.incrementAge();

  if (strategy.pitLaps.includes(lapNumber)) {
    state.cumulativeTime += pitLossFor(phase, PIT_LOSS);
    state.stintIndex += 1;
    const next: Compound | undefined = strategy.compoundSequence[state.stintIndex];
    tyre.reset(next);
  }

  return retired;
}

function byCumulativeTime(a: DriverRaceState, b: DriverRaceState): number {
  return a.cumulativeTime - b.cumulativeTime;
}

// ──────────────────────────────────────────────────────────
// simulateRace
// ──────────────────────────────────────────────────────────

export function simulateRace(
  track: Track,
  teams: readonly Team[],
  laps: number,
  options: RaceOptions,
): RaceResult {
  if (!Number.isInteger(laps) || laps < 1) {
    throw new Error('laps must be >= 1.');
  }
  if (teams.length === 0) {
    throw new Error('teams list must not be empty.');
  }
  const seen = new Set<string>();
  for (const driver of teams.flatMap((team) => team.drivers)) {
    if (seen.has(driver.name)) {
      throw new Error(`duplicate driver name '${driver.name}'.`);
    }
    seen.add(driver.name);
  }

  const strategies = options.strategies ?? {};
  for (const [driverName, strategy] of Object.entries(strategies)) {
    const issue = validateStrategy(strategy);
    if (issue) {
      throw new Error(`Strategy for driver '${driverName}': ${issue.message}`);
    }
  }

  const rng = createRng(options.seed);
  const noiseStd = options.noiseStd ?? DEFAULT_NOISE_STD;

  const states: DriverRaceState[] = [];
  for (const team of teams) {
    const { bestStrategy: defaultStrategy } = findBestConstantDeploy(track, team.car, laps);
    for (const driver of team.drivers) {
      const strategy = Object.hasOwn(strategies, driver.name) ? strategies[driver.name] : defaultStrategy;
      states.push(createDriverRaceState(driver, team.car, strategy));
    }
  }

  const safetyCar = SafetyCarController.forTrack(track);
  const scLapTime = safetyCarLapTime(track, teams.map((team) => team.car));
  const safetyCarLaps: number[] = [];
  const retired: DriverRaceState[] = [];

  for (let lapNumber = 1; lapNumber <= laps; lapNumber++) {
    const phase = safetyCar.beginLap(rng);
    if (phase === TrackPhase.SafetyCar) safetyCarLaps.push(lapNumber);

    for (const state of states) {
      if (!state.active) continue;
      if (stepDriver(state, track, lapNumber, phase, scLapTime, noiseStd, rng)) {
        retired.push(state);
      }
    }

    const ranked = states.filter((s) => s.active).sort(byCumulativeTime);
    if (phase === TrackPhase.SafetyCar) {
      compressGaps(ranked);
    } else {
      applyOvertakes(ranked, track, rng);
    }
  }

  const finishers = states.filter((s) => s.active).sort(byCumulativeTime);
  const lapTimes: Record<string, number[]> = {};
  const cumulativeTimes: Record<string, number> = {};
  for (const s of states) {
    lapTimes[s.driver.name] = s.lapTimes;
    cumulativeTimes[s.driver.name] = s.cumulativeTime;
  }

  const dnfList = retired.map((s) => s.driver.name);
  return {
    finalClassification: [...finishers.map((s) => s.driver.name), ...dnfList],
    dnfList,
    lapTimes,
    cumulativeTimes,
    safetyCarLaps,
  };
}
