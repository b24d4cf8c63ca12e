import { isRecord, parseTrackDescriptor } from '../engine/descriptors';
import type { Track } from '../engine/types';
import preseasonFile from './preseason.json';
import season2026File from './season-2026.json';

export interface CalendarInfo {
  id: string;
  name: string;
  /** Rounds in running order */
  tracks: Track[];
}

/** Parse a calendar file; any invalid round throws with its index and field. */
export function parseCalendarFile(raw: unknown): CalendarInfo {
  if (!isRecord(raw)) {
    throw new Error('calendar file must be an object');
  }
  const { id, name, rounds } = raw;
  if (typeof id !== 'string' || typeof name !== 'string' || !Array.isArray(rounds)) {
    throw new Error("calendar file needs string 'id', string 'name' and array 'rounds'");
  }
  if (rounds.length === 0) {
    throw new Error(`calendar '${id}' has no rounds`);
  }

  const tracks = rounds.map((round: unknown, index: number): Track => {
    const parsed = parseTrackDescriptor(round);
    if (!parsed.ok) {
      throw new Error(`calendar '${id}' round ${index + 1}: ${parsed.error.message}`);
    }
    return parsed.value;
  });
  return { id, name, tracks };
}

export const CALENDARS: CalendarInfo[] = [
  parseCalendarFile(season2026File),
  parseCalendarFile(preseasonFile),
];

export const DEFAULT_CALENDAR_ID = 'season-2026';

export function getCalendar(id: string): CalendarInfo {
  const calendar = CALENDARS.find((c) => c.id === id);
  if (!calendar) {
    throw new Error(`Unknown calendar "${id}". Available: ${CALENDARS.map((c) => c.id).join(', ')}`);
  }
  return calendar;
}
