/**
 * Purpose: Resolve engine and logging configuration.
 * Intent: Validate caller options once so evaluators can rely on a fixed clock and time zone.
 */

import winston from "winston";
import { ConfigError } from "./errors.js";
import type { DomainEvaluator } from "./types.js";

export type ServiceName = "orchestrator" | "dispatch" | "cli";

export const loggingConfig = {
  levels: winston.config.npm.levels,
  format: {
    timestamp: "YYYY-MM-DD HH:mm:ss",
  },
  services: {
    orchestrator: { level: "warn" },
    dispatch: { level: "warn" },
    cli: { level: "info" },
  } satisfies Record<ServiceName, { level: string }>,
};

/** Upper bound on subnets a single split may list. */
export const MAX_LISTED_SUBNETS = 1024;

export interface EngineOptions {
  /** 1-based line currently being typed; its expression is shown without re-spacing. */
  activeLine?: number;
  /** Fixed clock for `now`/`today`; defaults to the system clock. */
  now?: Date;
  /** IANA zone used for local dates; defaults to the host zone. */
  timeZone?: string;
  /** Replaces the default dispatch order. */
  evaluators?: DomainEvaluator[];
}

export interface EngineConfig {
  activeLine: number | null;
  now: () => Date;
  timeZone: string;
}

function makeNowGetter(now: Date | undefined): () => Date {
  if (now === undefined) return () => new Date();
  if (!(now instanceof Date) || Number.isNaN(now.getTime())) throw new ConfigError("now: invalid date");
  const fixed = now.getTime();
  return () => new Date(fixed);
}

export function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

export function hostTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function resolveEngineConfig(options: EngineOptions = {}): EngineConfig {
  const { activeLine } = options;
  if (activeLine !== undefined && (!Number.isInteger(activeLine) || activeLine < 0)) {
    throw new ConfigError(`activeLine: expected a non-negative integer, got ${activeLine}`);
  }

  const timeZone = options.timeZone ?? hostTimeZone();
  if (!isValidTimeZone(timeZone)) throw new ConfigError(`timeZone: unknown zone ${timeZone}`);

  return {
    activeLine: activeLine && activeLine > 0 ? activeLine : null,
    now: makeNowGetter(options.now),
    timeZone,
  };
}
