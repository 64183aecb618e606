/**
 * Structured logging.
 *
 * Uses pino for JSON-structured logs; pretty-printed in development.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

/**
 * Create a pino logger from the loaded configuration.
 */
export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  return pino({
    name: "sip-provenance",
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/**
 * A logger that discards everything. Default for library callers that
 * do not pass their own.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
