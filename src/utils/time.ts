/**
 * Asia/Seoul calendar helpers. The zone has a fixed +09:00 offset and no DST,
 * so civil fields are read from a shifted UTC date.
 */

export const SEOUL_OFFSET_MINUTES = 9 * 60;
export const DAY_MS = 24 * 60 * 60 * 1000;

const OFFSET_MS = SEOUL_OFFSET_MINUTES * 60 * 1000;

export interface SeoulParts {
  year: number;
  month: number;   // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: number; // 0 = Sunday
}

export function seoulParts(date: Date): SeoulParts {
  const shifted = new Date(date.getTime() + OFFSET_MS);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds(),
    weekday: shifted.getUTCDay(),
  };
}

/** Instant for a Seoul wall-clock time, or null when the fields are not a real calendar date */
export function seoulDateTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0
): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59) {
    return null;
  }
  const utc = Date.UTC(year, month - 1, day, hour, minute);
  const check = new Date(utc);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return new Date(utc - OFFSET_MS);
}

export function seoulMidnight(year: number, month: number, day: number): Date | null {
  return seoulDateTime(year, month, day);
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** ISO-8601 with an explicit +09:00 offset, e.g. `2024-05-01T00:00:00+09:00` */
export function toSeoulIso(date: Date): string {
  const p = seoulParts(date);
  return `${p.year}-${pad(p.month)}-${pad(p.day)}T${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}+09:00`;
}

/** `YYYY-MM-DD HH:mm:ss` in Seoul time, used in alerts and logs */
export function formatSeoulTimestamp(date: Date): string {
  const p = seoulParts(date);
  return `${p.year}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}`;
}

export function daysAgo(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
