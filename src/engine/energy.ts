import { BATTERY } from './constants';

/**
 * ERS battery. Charge always stays in [0, maxCharge]; harvest and deploy
 * return the amount actually moved, which may be less than requested.
 *
 * Created fresh per driver per replication -- never shared.
 */
export class EnergyState {
  readonly maxCharge: number;
  private _currentCharge: number;

  constructor(maxCharge: number = BATTERY.capacity, currentCharge?: number) {
    if (!(maxCharge > 0)) {
      throw new Error('max_charge must be > 0.');
    }
    const charge = currentCharge ?? maxCharge;
    if (!(charge >= 0)) {
      throw new Error('current_charge must be >= 0.');
    }
    if (charge > maxCharge) {
      throw new Error('current_charge must be <= max_charge.');
    }
    this.maxCharge = maxCharge;
    this._currentCharge = charge;
  }

  get currentCharge(): number {
    return this._currentCharge;
  }

  /** Deploy up to `amount` MJ. Returns the energy actually deployed. */
  deploy(amount: number): number {
    if (!(amount >= 0)) {
      throw new Error('deploy amount must be >= 0.');
    }
    const actual = Math.min(amount, this._currentCharge);
    this._currentCharge -= actual;
    return actual;
  }

  /** Harvest up to `amount` MJ, capped by headroom. Returns the energy stored. */
  harvest(amount: number): number {
    if (!(amount >= 0)) {
      throw new Error('harvest amount must be >= 0.');
    }
    const actual = Math.min(amount, this.maxCharge - this._currentCharge);
    this._currentCharge += actual;
    return actual;
  }
}
