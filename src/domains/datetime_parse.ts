/**
 * Purpose: Parse date, time, duration, and date-range phrases.
 * Intent: Return null for anything unrecognised so handlers can decline instead of failing.
 */

import { type WallClock, type Zone, daysInMonth, fromWallClock, lookupZone, wallClock } from "./datetime_zones.js";

export interface ParsedDateTime {
  instant: number;
  /** Zone the text was read in; results stay in it. */
  zone: Zone;
}

export const DURATION_UNIT = "seconds?|secs?|minutes?|mins?|hours?|hrs?|days?|weeks?|months?|years?|yrs?";

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const MONTHS: ReadonlyMap<string, number> = new Map([
  ["jan", 1], ["january", 1],
  ["feb", 2], ["february", 2],
  ["mar", 3], ["march", 3],
  ["apr", 4], ["april", 4],
  ["may", 5],
  ["jun", 6], ["june", 6],
  ["jul", 7], ["july", 7],
  ["aug", 8], ["august", 8],
  ["sep", 9], ["sept", 9], ["september", 9],
  ["oct", 10], ["october", 10],
  ["nov", 11], ["november", 11],
  ["dec", 12], ["december", 12],
]);

const TIME = String.raw`(\d{1,2}):(\d{2})(?::(\d{2}))?`;
const ISO_DATE = new RegExp(String.raw`^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ t]${TIME}(?:\s+(\S+))?)?$`);
const SLASH_DATE = new RegExp(String.raw`^(\d{1,2})/(\d{1,2})/(\d{4}|\d{2})(?:\s+${TIME}(?:\s+(\S+))?)?$`);
const MONTH_FIRST = new RegExp(String.raw`^([a-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})(?:\s+${TIME}(?:\s+(\S+))?)?$`);
const DAY_FIRST = /^(\d{1,2})\s+([a-z]+)\s+(\d{4})$/;
const TIME_ONLY = /^(\d{1,2})(?::(\d{2}))?(?::(\d{2}))?\s*(am|pm)?$/;

function num(text: string | undefined): number {
  return text === undefined ? 0 : Number(text);
}

function validWall(w: WallClock): boolean {
  return (
    w.month >= 1 &&
    w.month <= 12 &&
    w.day >= 1 &&
    w.day <= daysInMonth(w.year, w.month) &&
    w.hour < 24 &&
    w.minute < 60 &&
    w.second < 60
  );
}

function resolve(w: WallClock, zoneToken: string | undefined, defaultZone: Zone): ParsedDateTime | null {
  const zone = zoneToken === undefined ? defaultZone : lookupZone(zoneToken);
  if (!zone || !validWall(w)) return null;
  return { instant: fromWallClock(w, zone), zone };
}

function timeFields(m: RegExpExecArray, start: number): Pick<WallClock, "hour" | "minute" | "second"> {
  return { hour: num(m[start]), minute: num(m[start + 1]), second: num(m[start + 2]) };
}

function parseTimeOnly(text: string, zone: Zone, now: number): ParsedDateTime | null {
  const m = TIME_ONLY.exec(text);
  if (!m) return null;
  const meridiem = m[4];
  // A bare number is not a time.
  if (m[2] === undefined && meridiem === undefined) return null;

  let hour = num(m[1]);
  if (meridiem !== undefined) {
    if (hour < 1 || hour > 12) return null;
    hour = (hour % 12) + (meridiem === "pm" ? 12 : 0);
  }
  const today = wallClock(now, zone);
  return resolve({ ...today, hour, minute: num(m[2]), second: num(m[3]) }, undefined, zone);
}

/** Reads a date or time in `defaultZone` unless the text names its own zone; time-only input lands on today. */
export function parseDateTime(text: string, defaultZone: Zone, now: number): ParsedDateTime | null {
  const s = text.trim().toLowerCase().replace(/\s+/g, " ");

  let m = ISO_DATE.exec(s);
  if (m) {
    return resolve({ year: num(m[1]), month: num(m[2]), day: num(m[3]), ...timeFields(m, 4) }, m[7], defaultZone);
  }

  m = SLASH_DATE.exec(s);
  if (m) {
    const rawYear = num(m[3]);
    const year = (m[3] ?? "").length === 2 ? 2000 + rawYear : rawYear;
    let month = num(m[1]);
    let day = num(m[2]);
    // Month first; day-first when the first field cannot be a month.
    if (month > 12) [month, day] = [day, month];
    return resolve({ year, month, day, ...timeFields(m, 4) }, m[7], defaultZone);
  }

  m = MONTH_FIRST.exec(s);
  if (m) {
    const month = MONTHS.get(m[1] ?? "");
    if (month === undefined) return null;
    return resolve({ year: num(m[3]), month, day: num(m[2]), ...timeFields(m, 4) }, m[7], defaultZone);
  }

  m = DAY_FIRST.exec(s);
  if (m) {
    const month = MONTHS.get(m[2] ?? "");
    if (month === undefined) return null;
    return resolve({ year: num(m[3]), month, day: num(m[1]), hour: 0, minute: 0, second: 0 }, undefined, defaultZone);
  }

  return parseTimeOnly(s, defaultZone, now);
}

/** `Dec 6` or `6 dec` in the current year, else any full date. */
export function parsePartialDate(text: string, zone: Zone, now: number): ParsedDateTime | null {
  const s = text.trim().toLowerCase();
  const monthDay = /^([a-z]+)\s+(\d{1,2})$/.exec(s);
  const dayMonth = /^(\d{1,2})\s+([a-z]+)$/.exec(s);
  const monthName = monthDay?.[1] ?? dayMonth?.[2];
  const dayText = monthDay?.[2] ?? dayMonth?.[1];
  const month = monthName === undefined ? undefined : MONTHS.get(monthName);

  if (month !== undefined) {
    const { year } = wallClock(now, zone);
    return resolve({ year, month, day: num(dayText), hour: 0, minute: 0, second: 0 }, undefined, zone);
  }
  return parseDateTime(s, zone, now);
}

export function unitMillis(unit: string): number | null {
  const u = unit.trim().toLowerCase();
  if (u.startsWith("sec") || u === "s") return SECOND;
  if (u.startsWith("min") || u === "m") return MINUTE;
  if (u.startsWith("hour") || u.startsWith("hr") || u === "h") return HOUR;
  if (u.startsWith("day") || u === "d") return DAY;
  if (u.startsWith("week") || u === "w") return 7 * DAY;
  if (u.startsWith("month")) return 30.44 * DAY;
  if (u.startsWith("year") || u.startsWith("yr") || u === "y") return 365.25 * DAY;
  return null;
}

const DURATION = new RegExp(String.raw`^([\d.]+)\s*(${DURATION_UNIT}|s|m|h|d|w|y)$`);

/** Duration in milliseconds, e.g. `3.5 days`. */
export function parseDuration(text: string): number | null {
  const m = DURATION.exec(text.trim().toLowerCase());
  if (!m) return null;
  const value = Number(m[1]);
  const unit = unitMillis(m[2] ?? "");
  if (!Number.isFinite(value) || unit === null) return null;
  return value * unit;
}

export function convertDuration(ms: number, toUnit: string): number | null {
  const unit = unitMillis(toUnit);
  return unit === null ? null : ms / unit;
}

export function formatDuration(ms: number): string {
  if (ms < 0) return `-${formatDuration(-ms)}`;

  const hours = ms / HOUR;
  const days = hours / 24;
  if (days >= 1) {
    const wholeDays = Math.trunc(days);
    const rest = hours - wholeDays * 24;
    if (rest > 0) return `${wholeDays} days ${rest.toFixed(1)} hours`;
    return `${wholeDays} days`;
  }
  if (hours >= 1) return `${hours.toFixed(2)} hours`;
  const minutes = ms / MINUTE;
  if (minutes >= 1) return `${minutes.toFixed(2)} minutes`;
  return `${(ms / SECOND).toFixed(2)} seconds`;
}

const RANGE_SEPARATORS = [" till ", " until ", " to ", " - ", " through "];

export interface DateRange {
  start: number;
  end: number;
}

/** `dec 6 till march 11`; an end before the start rolls into the next year. */
export function parseDateRange(text: string, zone: Zone, now: number): DateRange | null {
  const s = text.trim().toLowerCase();
  for (const sep of RANGE_SEPARATORS) {
    const idx = s.indexOf(sep);
    if (idx <= 0) continue;
    const startText = s.slice(0, idx);
    const endText = s.slice(idx + sep.length);
    if (!endText.trim()) return null;

    const start = parsePartialDate(startText, zone, now);
    const end = parsePartialDate(endText, zone, now);
    if (!start || !end) return null;

    let endInstant = end.instant;
    if (endInstant < start.instant) {
      const w = wallClock(endInstant, end.zone);
      endInstant = fromWallClock({ ...w, year: w.year + 1 }, end.zone);
    }
    return { start: start.instant, end: endInstant };
  }
  return null;
}

export function daysBetween(range: DateRange): number {
  return (range.end - range.start) / DAY;
}
