/**
 * Wall-clock helpers evaluated in the exchange timezone.
 *
 * Dates are instants; every "local" question (weekday, time of day, trading
 * date) is answered through Intl in the configured timezone so the host's own
 * timezone never leaks into trading decisions.
 */

export type Weekday = "SUN" | "MON" | "TUE" | "WED" | "THU" | "FRI" | "SAT";

export const WEEKDAYS: readonly Weekday[] = [
  "SUN",
  "MON",
  "TUE",
  "WED",
  "THU",
  "FRI",
  "SAT",
];

export function isWeekday(value: string): value is Weekday {
  return (WEEKDAYS as readonly string[]).includes(value);
}

/** Time of day, second resolution */
export interface ClockTime {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  weekday: Weekday;
  hour: number;
  minute: number;
  second: number;
}

const CLOCK_TIME_RE = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parse "HH:MM" or "HH:MM:SS"; returns null for anything else
 */
export function parseClockTime(raw: string): ClockTime | null {
  const match = CLOCK_TIME_RE.exec(raw.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  const second = match[3] === undefined ? 0 : Number(match[3]);
  if (hour > 23 || minute > 59 || second > 59) return null;
  return { hour, minute, second };
}

/**
 * Parse a clock time known to be well formed; throws RangeError otherwise
 */
export function clockTime(raw: string): ClockTime {
  const parsed = parseClockTime(raw);
  if (!parsed) throw new RangeError(`invalid clock time "${raw}"`);
  return parsed;
}

export function secondsOfDay(t: ClockTime): number {
  return t.hour * 3600 + t.minute * 60 + t.second;
}

export function formatClockTime(t: ClockTime): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}`;
}

export function earlierOf(a: ClockTime, b: ClockTime): ClockTime {
  return secondsOfDay(a) <= secondsOfDay(b) ? a : b;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      weekday: "short",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Throws RangeError for an unknown timezone
 */
export function assertTimeZone(timeZone: string): void {
  formatterFor(timeZone);
}

export function zonedParts(date: Date, timeZone: string): ZonedParts {
  const parts = formatterFor(timeZone).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";

  const weekday = get("weekday").toUpperCase().slice(0, 3);
  return {
    year: Number(get("year")),
    month: Number(get("month")),
    day: Number(get("day")),
    weekday: isWeekday(weekday) ? weekday : "SUN",
    hour: Number(get("hour")),
    minute: Number(get("minute")),
    second: Number(get("second")),
  };
}

export function zonedClockTime(date: Date, timeZone: string): ClockTime {
  const p = zonedParts(date, timeZone);
  return { hour: p.hour, minute: p.minute, second: p.second };
}

/** Trading date key "YYYY-MM-DD" in the given timezone */
export function zonedDateKey(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${p.year}-${pad(p.month)}-${pad(p.day)}`;
}

/** "YYYY-MM-DD" from a UTC calendar date (used for request ranges) */
export function utcDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}
