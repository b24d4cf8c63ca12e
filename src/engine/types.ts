/**
 * Engine Type Contracts
 *
 * Value objects shared by every engine module: circuits, cars, drivers,
 * teams, tyre compounds and strategies. These are created once per scenario
 * and shared by reference across replications -- never mutated.
 *
 * Per-replication mutable state (battery, tyres, race bookkeeping) lives in
 * energy.ts, tyre.ts and race.ts.
 */

/** Tyre compound. String enum so names survive into aggregate outputs. */
export enum Compound {
  Soft = 'SOFT',
  Medium = 'MEDIUM',
  Hard = 'HARD',
}

/** Constant pace/degradation characteristics of a compound. */
export interface TyreCompound {
  readonly name: Compound;
  /** Additive lap-time offset in seconds. Negative = faster. */
  readonly basePaceDelta: number;
  /** Multiplier on the track/car degradation term. 1.0 = medium baseline. */
  readonly degradationRate: number;
}

/** A circuit. */
export interface Track {
  readonly name: string;
  /** Share of the lap spent on straights, 0..1 */
  readonly straightRatio: number;
  /** Relative ease of overtaking, 0..1 */
  readonly overtakeCoefficient: number;
  /** ERS recovery potential per lap, 0..1 */
  readonly energyHarvestFactor: number;
  /** Seconds of degradation per lap of tyre age (before car/compound scaling) */
  readonly tyreDegradationFactor: number;
  /** Seconds lost per unit of missing aero efficiency */
  readonly downforceSensitivity: number;
  /** Per-lap probability that a safety car is deployed, 0..1 */
  readonly safetyCarLambda: number;
  /** Per-lap probability that an active safety car comes in, 0..1 */
  readonly safetyCarResumeLambda: number;
}

/** Deterministic performance profile shared by both drivers of a team. */
export interface Car {
  readonly teamName: string;
  /** Baseline lap time in seconds (lower is faster) */
  readonly baseSpeed: number;
  readonly ersEfficiency: number;
  readonly aeroEfficiency: number;
  readonly tyreWearRate: number;
  readonly reliability: number;
}

export interface Driver {
  readonly name: string;
  readonly teamName: string;
  /** Additive lap-time offset. Negative = faster than the car baseline. */
  readonly skillOffset: number;
  /** Multiplier on lap-time noise standard deviation. */
  readonly consistency: number;
}

/** Constructor entry: one car, exactly two drivers. */
export interface Team {
  readonly name: string;
  readonly car: Car;
  readonly drivers: readonly [Driver, Driver];
}

/**
 * Driving plan for one race.
 * compoundSequence[0] is the starting tyre; entry i+1 is fitted at pitLaps[i].
 * Pit laps are 1-based: the stop happens at the end of that lap.
 */
export interface Strategy {
  readonly deployLevel: number;
  readonly harvestLevel: number;
  readonly compoundSequence: readonly Compound[];
  readonly pitLaps: readonly number[];
}

/** Outcome of a single race replication. */
export interface RaceResult {
  /** Finishers by cumulative time, then DNFs in retirement order. */
  finalClassification: string[];
  /** DNFs in retirement order. */
  dnfList: string[];
  lapTimes: Record<string, number[]>;
  cumulativeTimes: Record<string, number>;
  /** 1-based laps run under the safety car. */
  safetyCarLaps: number[];
}

/** A single invalid field reported by validation. */
export interface FieldIssue {
  field: string;
  message: string;
}
