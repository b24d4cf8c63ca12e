/**
 * Builds a grid from calibrated per-team parameters (see
 * parseCalibrationDescriptor). Teams come out sorted by name with two
 * placeholder drivers each.
 */

import type { CalibrationParams } from '../engine/descriptors';
import { createCar, createDriver, createTeam } from '../engine/entities';
import type { Team } from '../engine/types';

/** Defaults for the car fields calibration does not estimate. */
export const CALIBRATION_DEFAULTS = {
  aeroEfficiency: 0.85,
  tyreWearRate: 1.0,
  /** Lower bound applied to ers efficiency and reliability */
  minUnitValue: 0.01,
} as const;

function clampCalibrated(value: number): number {
  return Math.min(1.0, Math.max(CALIBRATION_DEFAULTS.minUnitValue, value));
}

export function buildTeamsFromCalibration(params: Readonly<CalibrationParams>): Team[] {
  const names = Object.keys(params).sort();
  if (names.length === 0) {
    throw new Error('calibration parameters must name at least one team.');
  }

  return names.map((teamName) => {
    const attrs = params[teamName];
    const car = createCar({
      teamName,
      baseSpeed: attrs.baseSpeed,
      ersEfficiency: clampCalibrated(attrs.ersEfficiency),
      aeroEfficiency: CALIBRATION_DEFAULTS.aeroEfficiency,
      tyreWearRate: CALIBRATION_DEFAULTS.tyreWearRate,
      reliability: clampCalibrated(attrs.reliability),
    });
    const drivers = [1, 2].map((n) =>
      createDriver({ name: `${teamName} Driver ${n}`, teamName, skillOffset: 0.0, consistency: 1.0 }),
    );
    return createTeam(teamName, car, drivers);
  });
}
