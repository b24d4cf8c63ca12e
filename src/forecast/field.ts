/**
 * Field bookkeeping shared by the aggregators: grid-ordered name lists and
 * the driver -> team map. Rejects fields that would collide on driver name.
 */

import type { Team } from '../engine/types';

export interface FieldIndex {
  driverNames: string[];
  teamNames: string[];
  driverToTeam: Map<string, string>;
}

export function indexField(teams: readonly Team[]): FieldIndex {
  if (teams.length === 0) {
    throw new Error('teams list must not be empty.');
  }
  const driverNames: string[] = [];
  const teamNames: string[] = [];
  const driverToTeam = new Map<string, string>();

  for (const team of teams) {
    if (teamNames.includes(team.name)) {
      throw new Error(`duplicate team name '${team.name}'.`);
    }
    teamNames.push(team.name);
    for (const driver of team.drivers) {
      if (driverToTeam.has(driver.name)) {
        throw new Error(`duplicate driver name '${driver.name}'.`);
      }
      driverNames.push(driver.name);
      driverToTeam.set(driver.name, team.name);
    }
  }
  return { driverNames, teamNames, driverToTeam };
}

/** Histogram counts -> probabilities keyed by 1-based position. */
export function normalizeHistogram(counts: Map<number, number>, inv: number): Record<number, number> {
  const result: Record<number, number> = {};
  for (const position of [...counts.keys()].sort((a, b) => a - b)) {
    result[position] = (counts.get(position) ?? 0) * inv;
  }
  return result;
}

export function zeroRecord(names: readonly string[]): Record<string, number> {
  const result: Record<string, number> = {};
  for (const name of names) result[name] = 0;
  return result;
}

export function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${field} must be >= 1.`);
  }
}
