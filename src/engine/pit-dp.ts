/**
 * Dynamic-Programming Pit Optimiser
 *
 * Exact finite-horizon solve over (lap, tyreAge, compound):
 *
 *   V(L, a, c) = 0
 *   V(l, a, c) = min( cost(a, c) + V(l+1, min(a+1, L), c),            continue
 *                     PIT_LOSS + cost(0, x) + V(l+1, 1, x)  for each x )  pit, 0 < l < L-1
 *
 * cost(a, c) is the zero-deploy compound lap time. A pit chosen at lap
 * index l means lap l is driven on fresh tyres, i.e. the stop happens at
 * the end of 1-based lap l -- the same convention the race simulator uses.
 *
 * Value and policy tables are flat typed arrays indexed by
 * ((lap * (L + 1)) + age) * 3 + compound.
 */

import { COMPOUND_ORDER, PIT_LOSS } from './constants';
import { createStrategy } from './entities';
import { compoundLapTime } from './physics';
import { Compound } from './types';
import type { Car, Strategy, Track } from './types';

export interface DpResult {
  /**
   * Zero deploy/harvest plan. Each pit lap is the 1-based lap at whose end
   * the stop happens, so the next lap is the first on fresh tyres.
   */
  strategy: Strategy;
  /** Optimal zero-deploy race time including pit losses */
  totalTime: number;
}

const CONTINUE = -1;
const COMPOUND_COUNT = COMPOUND_ORDER.length;

function compoundIndex(compound: Compound): number {
  return COMPOUND_ORDER.indexOf(compound);
}

/** cost[age * 3 + c] for age in [0, L]. */
function buildLapCostTable(track: Track, car: Car, totalLaps: number): Float64Array {
  const table = new Float64Array((totalLaps + 1) * COMPOUND_COUNT);
  for (let age = 0; age <= totalLaps; age++) {
    for (let c = 0; c < COMPOUND_COUNT; c++) {
      table[age * COMPOUND_COUNT + c] = compoundLapTime(track, car, age, COMPOUND_ORDER[c], 0);
    }
  }
  return table;
}

export function computeOptimalStrategyDp(
  track: Track,
  car: Car,
  totalLaps: number,
  startingCompound: Compound = Compound.Medium,
  pitLoss: number = PIT_LOSS,
): DpResult {
  if (!Number.isInteger(totalLaps) || totalLaps < 1) {
    throw new Error('total_laps must be >= 1.');
  }

  const ages = totalLaps + 1;
  const index = (lap: number, age: number, c: number): number =>
    (lap * ages + age) * COMPOUND_COUNT + c;

  const lapCost = buildLapCostTable(track, car, totalLaps);
  const value = new Float64Array((totalLaps + 1) * ages * COMPOUND_COUNT);
  const policy = new Int8Array(totalLaps * ages * COMPOUND_COUNT);

  // value[L, *, *] is already zero
  for (let lap = totalLaps - 1; lap >= 0; lap--) {
    const canPit = lap > 0 && lap < totalLaps - 1;
    for (let age = 0; age <= totalLaps; age++) {
      const nextAge = Math.min(age + 1, totalLaps);
      for (let c = 0; c < COMPOUND_COUNT; c++) {
        let best = lapCost[age * COMPOUND_COUNT + c] + value[index(lap + 1, nextAge, c)];
        let action = CONTINUE;

        if (canPit) {
          for (let x = 0; x < COMPOUND_COUNT; x++) {
            const pitCost = pitLoss + lapCost[x] + value[index(lap + 1, 1, x)];
            if (pitCost < best) {
              best = pitCost;
              action = x;
            }
          }
        }

        value[index(lap, age, c)] = best;
        policy[index(lap, age, c)] = action;
      }
    }
  }

  // Forward replay from fresh tyres on the starting compound
  let c = compoundIndex(startingCompound);
  let age = 0;
  const compoundSequence: Compound[] = [startingCompound];
  const pitLaps: number[] = [];

  for (let lap = 0; lap < totalLaps; lap++) {
    const action = policy[index(lap, age, c)];
    if (action === CONTINUE) {
      age = Math.min(age + 1, totalLaps);
    } else {
      c = action;
      age = 1;
      pitLaps.push(lap);
      compoundSequence.push(COMPOUND_ORDER[c]);
    }
  }

  return {
    strategy: createStrategy({ deployLevel: 0, harvestLevel: 0, compoundSequence, pitLaps }),
    totalTime: value[index(0, 0, compoundIndex(startingCompound))],
  };
}

/**
 * Zero-deploy race time of a pit plan under the DP cost model.
 * Stops happen at the end of each listed lap; pitLoss is added per stop.
 */
export function evaluateStrategyCost(
  track: Track,
  car: Car,
  strategy: Strategy,
  totalLaps: number,
  pitLoss: number = PIT_LOSS,
): number {
  if (!Number.isInteger(totalLaps) || totalLaps < 1) {
    throw new Error('total_laps must be >= 1.');
  }

  let stint = 0;
  let age = 0;
  let total = 0;
  for (let lap = 1; lap <= totalLaps; lap++) {
    total += compoundLapTime(track, car, age, strategy.compoundSequence[stint], 0);
    age += 1;
    if (strategy.pitLaps.includes(lap)) {
      total += pitLoss;
      if (stint + 1 < strategy.compoundSequence.length) stint += 1;
      age = 0;
    }
  }
  return total;
}
