/**
 * Tyre State
 *
 * Per-driver wear tracker. Age counts whole laps on the current set and is
 * zeroed on every pit stop, optionally with a compound change.
 */

import { COMPOUNDS } from './constants';
import { Compound } from './types';
import type { TyreCompound } from './types';

/** Pace/degradation table entry for a compound. */
export function getCompound(compound: Compound): TyreCompound {
  return COMPOUNDS[compound];
}

export class TyreState {
  private _age: number;
  readonly wearRateMultiplier: number;
  private _compound: Compound;

  constructor(age = 0, wearRateMultiplier = 1.0, compound: Compound = Compound.Medium) {
    if (!Number.isInteger(age) || age < 0) {
      throw new Error('age must be a non-negative integer.');
    }
    if (!(wearRateMultiplier >= 0)) {
      throw new Error('wear_rate_multiplier must be >= 0.');
    }
    this._age = age;
    this.wearRateMultiplier = wearRateMultiplier;
    this._compound = compound;
  }

  get age(): number {
    return this._age;
  }

  get compound(): Compound {
    return this._compound;
  }

  incrementAge(): void {
    this._age += 1;
  }

  /** Fit a fresh set. Keeps the current compound when none is given. */
  reset(compound?: Compound): void {
    this._age = 0;
    if (compound !== undefined) {
      this._compound = compound;
    }
  }
}
