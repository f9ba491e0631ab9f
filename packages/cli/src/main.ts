#!/usr/bin/env tsx
/**
 * @tally/cli — Entry point.
 *
 * Wires the CLI to the real process and sets the exit code.
 */

import { run } from "./cli.js";

run(process.argv, {
  stdout: (chunk) => process.stdout.write(chunk),
  stderr: (chunk) => process.stderr.write(chunk),
  env: process.env,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal error:", err);
    process.exitCode = 1;
  });
