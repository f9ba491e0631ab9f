/**
 * Test helpers for @tally/cli.
 */

import { fileURLToPath } from "node:url";
import pino from "pino";
import type { DestinationStream, LevelWithSilent, Logger } from "pino";
import type { CliIo } from "../src/cli.js";

export function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

/** A pino sink that keeps every log line as a parsed object. */
export function captureSink(): { destination: DestinationStream; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    destination: {
      write(msg: string): void {
        lines.push(JSON.parse(msg));
      },
    },
  };
}

export function captureLogger(level: LevelWithSilent = "debug"): {
  logger: Logger;
  lines: Record<string, unknown>[];
} {
  const { destination, lines } = captureSink();
  return { logger: pino({ level }, destination), lines };
}

/** CliIo that records stdout/stderr and logs in memory. */
export function memoryIo(env: Record<string, string | undefined> = {}): CliIo & {
  out: () => string;
  err: () => string;
  logs: Record<string, unknown>[];
} {
  let stdout = "";
  let stderr = "";
  const sink = captureSink();
  return {
    stdout: (chunk) => {
      stdout += chunk;
    },
    stderr: (chunk) => {
      stderr += chunk;
    },
    env,
    logDestination: sink.destination,
    out: () => stdout,
    err: () => stderr,
    logs: sink.lines,
  };
}
