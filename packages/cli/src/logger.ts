/**
 * @tally/cli — Structured logging.
 *
 * Uses pino for JSON-structured logs on stderr. stdout is reserved
 * for the account report.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { LogLevel } from "./config.js";

export interface LoggerOptions {
  readonly level: LogLevel;
  /** Human-readable output through pino-pretty */
  readonly pretty: boolean;
}

/**
 * Create the root logger.
 *
 * Without a destination, JSON lines go to file descriptor 2.
 * Pretty output always goes to stderr through the pino-pretty transport.
 */
export function createLogger(
  options: LoggerOptions,
  destination?: DestinationStream,
): Logger {
  if (options.pretty) {
    return pino({
      level: options.level,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }

  return pino({ level: options.level }, destination ?? pino.destination(2));
}
