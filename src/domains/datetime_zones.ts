/**
 * Purpose: Resolve place names and abbreviations to time zones and convert between instants and wall-clock fields.
 * Intent: Use the platform's Intl zone data; city and abbreviation aliases come from data/timezones.json.
 */

import { readFileSync } from "node:fs";
import { isValidTimeZone } from "../config.js";

export type Zone = { kind: "iana"; name: string } | { kind: "fixed"; offsetMinutes: number };

export interface WallClock {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

interface ZoneTables {
  cities: ReadonlyMap<string, string>;
  abbreviations: ReadonlyMap<string, string>;
}

const TABLES_URL = new URL("../../data/timezones.json", import.meta.url);

function toStringMap(value: unknown, label: string): Map<string, string> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error(`timezones.json: ${label} must be an object`);
  }
  const out = new Map<string, string>();
  for (const [key, zone] of Object.entries(value)) {
    if (typeof zone !== "string") throw new Error(`timezones.json: ${label}.${key} must be a string`);
    out.set(key, zone);
  }
  return out;
}

let tables: ZoneTables | null = null;

function zoneTables(): ZoneTables {
  if (tables) return tables;
  const raw: unknown = JSON.parse(readFileSync(TABLES_URL, "utf8"));
  if (typeof raw !== "object" || raw === null) throw new Error("timezones.json: expected an object");
  tables = {
    cities: toStringMap("cities" in raw ? raw.cities : undefined, "cities"),
    abbreviations: toStringMap("abbreviations" in raw ? raw.abbreviations : undefined, "abbreviations"),
  };
  return tables;
}

const FIXED_OFFSET = /^(?:gmt|utc)([+-])(\d{1,2})(?::?(\d{2}))?$/;

export function lookupZone(name: string): Zone | null {
  const trimmed = name.trim();
  const lower = trimmed.toLowerCase();
  if (!lower) return null;

  const { cities, abbreviations } = zoneTables();
  const alias = cities.get(lower) ?? abbreviations.get(lower);
  if (alias) return { kind: "iana", name: alias };

  const fixed = FIXED_OFFSET.exec(lower);
  if (fixed) {
    const hours = Number(fixed[2]);
    const minutes = Number(fixed[3] ?? "0");
    if (hours > 14 || minutes > 59) return null;
    const sign = fixed[1] === "-" ? -1 : 1;
    return { kind: "fixed", offsetMinutes: sign * (hours * 60 + minutes) };
  }

  if (trimmed.includes("/") && isValidTimeZone(trimmed)) {
    return { kind: "iana", name: new Intl.DateTimeFormat("en-US", { timeZone: trimmed }).resolvedOptions().timeZone };
  }
  return null;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  const cached = formatters.get(timeZone);
  if (cached) return cached;
  const fmt = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    timeZoneName: "short",
  });
  formatters.set(timeZone, fmt);
  return fmt;
}

function zoneParts(instant: number, timeZone: string): Map<string, string> {
  const parts = new Map<string, string>();
  for (const part of formatterFor(timeZone).formatToParts(new Date(instant))) parts.set(part.type, part.value);
  return parts;
}

function utcFields(ms: number): WallClock {
  const d = new Date(ms);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    second: d.getUTCSeconds(),
  };
}

function fieldsToUtc(w: WallClock): number {
  return Date.UTC(w.year, w.month - 1, w.day, w.hour, w.minute, w.second);
}

export function wallClock(instant: number, zone: Zone): WallClock {
  if (zone.kind === "fixed") return utcFields(instant + zone.offsetMinutes * 60_000);
  const parts = zoneParts(instant, zone.name);
  const num = (type: string): number => Number(parts.get(type) ?? "0");
  return {
    year: num("year"),
    month: num("month"),
    day: num("day"),
    hour: num("hour") % 24,
    minute: num("minute"),
    second: num("second"),
  };
}

export function offsetMinutes(zone: Zone, instant: number): number {
  if (zone.kind === "fixed") return zone.offsetMinutes;
  const wholeSecond = Math.floor(instant / 1000) * 1000;
  return Math.round((fieldsToUtc(wallClock(wholeSecond, zone)) - wholeSecond) / 60_000);
}

/** Instant for the given wall-clock fields; in a DST gap the later offset wins. */
export function fromWallClock(w: WallClock, zone: Zone): number {
  const local = fieldsToUtc(w);
  const first = offsetMinutes(zone, local);
  const guess = local - first * 60_000;
  const second = offsetMinutes(zone, guess);
  return second === first ? guess : local - second * 60_000;
}

export function startOfDay(instant: number, zone: Zone): number {
  const w = wallClock(instant, zone);
  return fromWallClock({ ...w, hour: 0, minute: 0, second: 0 }, zone);
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function formatFixedOffset(offset: number): string {
  if (offset === 0) return "UTC";
  const sign = offset < 0 ? "-" : "+";
  const abs = Math.abs(offset);
  const hours = Math.floor(abs / 60);
  const minutes = abs % 60;
  return minutes === 0 ? `GMT${sign}${hours}` : `GMT${sign}${hours}:${String(minutes).padStart(2, "0")}`;
}

export function zoneLabel(zone: Zone, instant: number): string {
  if (zone.kind === "fixed") return formatFixedOffset(zone.offsetMinutes);
  return zoneParts(instant, zone.name).get("timeZoneName") ?? formatFixedOffset(offsetMinutes(zone, instant));
}

const pad2 = (n: number): string => String(n).padStart(2, "0");

export function formatDate(instant: number, zone: Zone): string {
  const w = wallClock(instant, zone);
  return `${String(w.year).padStart(4, "0")}-${pad2(w.month)}-${pad2(w.day)}`;
}

/** `YYYY-MM-DD HH:mm ZONE`, truncated to the minute. */
export function formatTimestamp(instant: number, zone: Zone): string {
  const w = wallClock(instant, zone);
  return `${formatDate(instant, zone)} ${pad2(w.hour)}:${pad2(w.minute)} ${zoneLabel(zone, instant)}`;
}
