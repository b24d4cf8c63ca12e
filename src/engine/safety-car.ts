/**
 * SafetyCarController: Track-Regime State Machine
 *
 * Two phases, Green and SafetyCar. At the start of every lap the controller
 * draws at most one transition: the track's safetyCarLambda deploys the car,
 * safetyCarResumeLambda brings it in. A zero probability consumes no draw.
 *
 * While the safety car is out the race simulator overrides every lap time
 * with a fixed pace, re-spaces the field and suppresses overtaking.
 */

import { SAFETY_CAR } from './constants';
import { lapTime } from './physics';
import type { Rng } from './rng';
import type { Car, Track } from './types';

export enum TrackPhase {
  Green = 'green',
  SafetyCar = 'safety_car',
}

export class SafetyCarController {
  private _phase: TrackPhase = TrackPhase.Green;

  constructor(
    private readonly deployProbability: number,
    private readonly resumeProbability: number,
  ) {}

  static forTrack(track: Track): SafetyCarController {
    return new SafetyCarController(track.safetyCarLambda, track.safetyCarResumeLambda);
  }

  get phase(): TrackPhase { return this._phase; }

  get active(): boolean { return this._phase === TrackPhase.SafetyCar; }

  /** Draw this lap's transition (if any) and return the phase to race under. */
  beginLap(rng: Rng): TrackPhase {
    const phase = this._phase;
    switch (phase) {
      case TrackPhase.Green:
        if (this.deployProbability > 0 && rng.next() < this.deployProbability) {
          this._phase = TrackPhase.SafetyCar;
        }
        break;

      case TrackPhase.SafetyCar:
        if (this.resumeProbability > 0 && rng.next() < this.resumeProbability) {
          this._phase = TrackPhase.Green;
        }
        break;

      default: {
        const _exhaustive: never = phase;
        throw new Error(`unknown track phase: ${String(_exhaustive)}`);
      }
    }
    return this._phase;
  }
}

/** Fixed lap time behind the safety car: factor x the fastest clean lap in the field. */
export function safetyCarLapTime(track: Track, cars: readonly Car[]): number {
  if (cars.length === 0) {
    throw new Error('cars list must not be empty.');
  }
  const fastest = Math.min(...cars.map((car) => lapTime(track, car, 0, 0)));
  return SAFETY_CAR.lapTimeFactor * fastest;
}

/** Pit loss under the current phase. */
export function pitLossFor(phase: TrackPhase, pitLoss: number): number {
  return phase === TrackPhase.SafetyCar ? pitLoss * SAFETY_CAR.pitMultiplier : pitLoss;
}

/**
 * Bunch the field behind the leader at a fixed interval.
 * `ranked` must already be sorted by cumulative time.
 */
export function compressGaps<T extends { cumulativeTime: number }>(ranked: readonly T[]): void {
  if (ranked.length === 0) return;
  const leaderTime = ranked[0].cumulativeTime;
  for (let i = 1; i < ranked.length; i++) {
    ranked[i].cumulativeTime = leaderTime + i * SAFETY_CAR.gapInterval;
  }
}
