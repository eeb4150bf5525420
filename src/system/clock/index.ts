/**
 * Wall-clock readings in the relay's single process-wide timezone
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

export interface WallClock {
  day: string; // YYYYMMDD
  hour: number;
  minute: number;
}

export function defaultTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23'
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Throws a RangeError for an unknown IANA zone name
 */
export function assertTimezone(timeZone: string): void {
  formatterFor(timeZone);
}

export function toWallClock(date: Date, timeZone: string): WallClock {
  const parts: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    parts[part.type] = part.value;
  }

  return {
    day: `${parts.year}${parts.month}${parts.day}`,
    hour: Number(parts.hour),
    minute: Number(parts.minute)
  };
}

export function dayKey(date: Date, timeZone: string): string {
  return toWallClock(date, timeZone).day;
}

/**
 * "20261019" -> "2026-10-19"
 */
export function formatDayKey(day: string): string {
  if (!/^\d{8}$/.test(day)) {
    return day;
  }
  return `${day.slice(0, 4)}-${day.slice(4, 6)}-${day.slice(6, 8)}`;
}

export function formatPostTime(hour: number, minute: number): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}
