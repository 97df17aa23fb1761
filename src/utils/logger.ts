// src/utils/logger.ts
/**
 * Root pino logger for the process.
 *
 * Built once by the entrypoint from AppConfig and passed to every component
 * that logs. There is deliberately no module-level `logger` export.
 */

import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from "pino";
import { SERVICE_NAME, type LogLevel } from "../config";

export type { Logger };

export function createLogger(opts: {
  level: LogLevel;
  env?: string;
}): Logger {
  const options: LoggerOptions = {
    level: opts.level,
    base: { service: SERVICE_NAME, env: opts.env },
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: ["req.headers.authorization", "req.headers.cookie"],
    },
  };
  return pino(options);
}

/** Logger that drops everything; used by tests and tooling. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
