/**
 * Purpose: Evaluate date, time, zone, and duration phrasings.
 * Intent: Read the clock and the local zone from engine configuration so results are reproducible under test.
 */

import type { EngineConfig } from "../config.js";
import { DomainError } from "../errors.js";
import type { DomainEvaluator, LineContext } from "../types.js";
import {
  DURATION_UNIT,
  convertDuration,
  daysBetween,
  formatDuration,
  parseDateRange,
  parseDateTime,
  parseDuration,
  unitMillis,
} from "./datetime_parse.js";
import { type Zone, formatDate, formatTimestamp, lookupZone, startOfDay } from "./datetime_zones.js";
import {
  HandlerChain,
  NOT_MINE,
  claimed,
  createChainEvaluator,
  defineHandler,
  parseDecimal,
  regexHandler,
  type Handler,
} from "./domain_shared.js";

export type DateTimeEnv = Pick<EngineConfig, "now" | "timeZone">;

const KEYWORDS = [
  "now", "today", "yesterday", "tomorrow",
  "hours", "hour", "hrs", "hr",
  "minutes", "minute", "mins", "min",
  "seconds", "second", "secs", "sec",
  "days", "day", "weeks", "week",
  "months", "month", "years", "year", "yrs", "yr",
  " in ", " till ", " until ", " to ",
  "am", "pm",
];

const DATE_PATTERNS = [/\d{4}-\d{2}-\d{2}/, /\d{1,2}\/\d{1,2}\/\d{4}/, /\d{1,2}:\d{2}/];

export function isDateTimeExpression(expr: string): boolean {
  if (expr.includes("\\")) return true;
  const lower = expr.toLowerCase();
  return KEYWORDS.some((kw) => lower.includes(kw)) || DATE_PATTERNS.some((re) => re.test(expr));
}

/** Replaces `\N` that points at an earlier date/time line with that line's timestamp. */
export function substituteDateTimeRefs(expr: string, ctx: LineContext): string {
  return expr.replace(/\\(\d+)/g, (whole, digits: string) => {
    const n = Number(digits);
    if (n >= ctx.lineNumber) return whole;
    const line = ctx.lookup(n);
    return line?.isDateTime && line.dateTimeRef ? line.dateTimeRef : whole;
  });
}

function group(m: RegExpExecArray, index: number): string {
  return (m[index] ?? "").trim();
}

const MULTIPLY = "[x×*]";
const SHORT_UNIT = "seconds?|secs?|minutes?|mins?|hours?|hrs?|days?|weeks?";

export function createDateTimeHandlers(env: DateTimeEnv): Handler[] {
  const localZone: Zone = { kind: "iana", name: env.timeZone };
  const nowMs = (): number => env.now().getTime();

  return [
    regexHandler("now-in", /^now(?:\(\))?\s+in\s+(.+)$/, (m) => {
      const place = group(m, 1);
      const zone = lookupZone(place);
      if (!zone) throw new DomainError("datetime", "LP_DOMAIN_UNKNOWN_ZONE", `unknown timezone/city: ${place}`);
      return claimed(formatTimestamp(nowMs(), zone));
    }),
    defineHandler("now", (_expr, lower) =>
      lower === "now" || lower === "now()" ? claimed(formatTimestamp(nowMs(), localZone)) : NOT_MINE
    ),
    defineHandler("today", (_expr, lower) =>
      lower === "today" || lower === "today()" ? claimed(formatDate(nowMs(), localZone)) : NOT_MINE
    ),
    regexHandler("time-conversion", /^(\d{1,2}(?::\d{2})?(?::\d{2})?\s*(?:am|pm)?)\s+(.+?)\s+in\s+(.+)$/, (m) => {
      const from = lookupZone(group(m, 2));
      const to = lookupZone(group(m, 3));
      if (!from || !to) return NOT_MINE;
      const parsed = parseDateTime(group(m, 1), from, nowMs());
      return parsed ? claimed(formatTimestamp(parsed.instant, to)) : NOT_MINE;
    }),
    regexHandler(
      "duration-conversion",
      new RegExp(String.raw`^([\d.]+)\s*(${DURATION_UNIT})\s+in\s+(${DURATION_UNIT})$`),
      (m) => {
        const toUnit = group(m, 3);
        const ms = parseDuration(`${group(m, 1)} ${group(m, 2)}`);
        const value = ms === null ? null : convertDuration(ms, toUnit);
        if (value === null) return NOT_MINE;
        return claimed(Number.isInteger(value) ? `${value.toFixed(0)} ${toUnit}` : `${value.toFixed(2)} ${toUnit}`);
      }
    ),
    regexHandler(
      "date-arithmetic",
      new RegExp(String.raw`^(.+?)\s*([+\-−])\s*([\d.]+)\s*(${DURATION_UNIT})$`),
      (m) => {
        const base = group(m, 1);
        const amount = parseDecimal(m[3]);
        const unit = unitMillis(group(m, 4));
        if (amount === null || unit === null) return NOT_MINE;

        let start: { instant: number; zone: Zone } | null;
        if (base === "today" || base === "today()") start = { instant: startOfDay(nowMs(), localZone), zone: localZone };
        else if (base === "now" || base === "now()") start = { instant: nowMs(), zone: localZone };
        else start = parseDateTime(base, localZone, nowMs());
        if (!start) return NOT_MINE;

        const delta = amount * unit * (m[2] === "+" ? 1 : -1);
        return claimed(formatTimestamp(start.instant + delta, start.zone));
      }
    ),
    regexHandler("zone-conversion", /^(.+?)\s+([a-z]{2,4})\s+in\s+(\w+(?:\s+\w+)?)$/, (m) => {
      const from = lookupZone(group(m, 2));
      const to = lookupZone(group(m, 3));
      if (!from || !to) return NOT_MINE;
      const parsed = parseDateTime(group(m, 1), from, nowMs());
      return parsed ? claimed(formatTimestamp(parsed.instant, to)) : NOT_MINE;
    }),
    defineHandler("date-range", (_expr, lower) => {
      const range = parseDateRange(lower, localZone, nowMs());
      if (!range) return NOT_MINE;
      const days = daysBetween(range);
      return claimed(Number.isInteger(days) ? `${days} days` : `${days.toFixed(1)} days`);
    }),
    defineHandler("duration-multiplication", (_expr, lower) => {
      if (!["hour", "hr", "min", "sec", "day", "week"].some((u) => lower.includes(u))) return NOT_MINE;

      // 13 x 3 min
      let m = new RegExp(String.raw`^([\d.]+)\s*${MULTIPLY}\s*([\d.]+)\s*(${SHORT_UNIT})$`).exec(lower);
      if (m) {
        const a = parseDecimal(m[1]);
        const b = parseDecimal(m[2]);
        const unit = unitMillis(group(m, 3));
        if (a === null || b === null || unit === null) return NOT_MINE;
        return claimed(formatDuration(a * b * unit));
      }

      // 8 hours x 5
      m = new RegExp(String.raw`^([\d.]+)\s*(${SHORT_UNIT})\s*${MULTIPLY}\s*([\d.]+)$`).exec(lower);
      if (m) {
        const a = parseDecimal(m[1]);
        const unit = unitMillis(group(m, 2));
        const b = parseDecimal(m[3]);
        if (a === null || b === null || unit === null) return NOT_MINE;
        return claimed(formatDuration(a * unit * b));
      }

      // (8 hours x 5 x 2) x 2
      m = new RegExp(
        String.raw`^\(([\d.]+)\s*(hours?|hrs?|minutes?|mins?|days?)\s*${MULTIPLY}\s*([\d.]+)\s*${MULTIPLY}\s*([\d.]+)\)\s*${MULTIPLY}\s*([\d.]+)$`
      ).exec(lower);
      if (m) {
        const factors = [m[1], m[3], m[4], m[5]].map(parseDecimal);
        const unit = unitMillis(group(m, 2));
        if (unit === null || factors.some((f) => f === null)) return NOT_MINE;
        return claimed(formatDuration(factors.reduce<number>((acc, f) => acc * (f ?? 1), unit)));
      }
      return NOT_MINE;
    }),
  ];
}

export function createDateTimeEvaluator(env: DateTimeEnv): DomainEvaluator {
  return createChainEvaluator({
    name: "datetime",
    matches: isDateTimeExpression,
    chain: new HandlerChain(createDateTimeHandlers(env)),
    prepare: substituteDateTimeRefs,
    toResult: (text) => ({ text, dateTime: text }),
  });
}
