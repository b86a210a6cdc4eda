/**
 * Purpose: Create per-service winston loggers.
 * Intent: Keep evaluation quiet by default while letting LOG_LEVEL surface line failures and dispatch decisions.
 */

import winston from "winston";
import { loggingConfig, type ServiceName } from "./config.js";

function levelFor(service: ServiceName): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === "test") return process.env.TEST_LOG_LEVEL ?? "error";
  return loggingConfig.services[service].level;
}

const loggers = new Map<ServiceName, winston.Logger>();

export function createServiceLogger(service: ServiceName): winston.Logger {
  const existing = loggers.get(service);
  if (existing) return existing;

  const logger = winston.createLogger({
    levels: loggingConfig.levels,
    level: levelFor(service),
    format: winston.format.combine(
      winston.format.timestamp({ format: loggingConfig.format.timestamp }),
      winston.format.json()
    ),
    defaultMeta: { service },
    transports: [
      // stdout carries rendered documents
      new winston.transports.Console({ stderrLevels: Object.keys(loggingConfig.levels) }),
    ],
  });
  loggers.set(service, logger);
  return logger;
}
