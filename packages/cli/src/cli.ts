/**
 * @tally/cli — Command definition.
 *
 * `tally <transactions.csv>` replays the log and prints one row per
 * client to stdout. Diagnostics go to stderr through pino.
 */

import { Command, CommanderError } from "commander";
import { z } from "zod";
import type { DestinationStream } from "pino";
import { formatAccounts, REPORT_FORMATS } from "./account-writer.js";
import type { AppConfig } from "./config.js";
import { formatIssues, loadConfig, LogLevelSchema } from "./config.js";
import { InputFileError } from "./errors.js";
import type { ExitCode } from "./exit-codes.js";
import { ExitCodes } from "./exit-codes.js";
import { createLogger } from "./logger.js";
import { replayFile } from "./replay.js";

/**
 * Process handles the CLI runs against. Tests substitute their own.
 */
export interface CliIo {
  readonly stdout: (chunk: string) => void;
  readonly stderr: (chunk: string) => void;
  readonly env: Record<string, string | undefined>;
  /** Log sink; defaults to pino's stderr destination */
  readonly logDestination?: DestinationStream | undefined;
}

/**
 * Command options validated by Zod at the CLI boundary.
 */
export const ReplayCommandOptionsSchema = z.object({
  format: z.enum(REPORT_FORMATS).default("csv"),
  logLevel: LogLevelSchema.optional(),
});

export type ReplayCommandOptions = z.infer<typeof ReplayCommandOptionsSchema>;

/**
 * Run the CLI and resolve with the process exit code.
 *
 * @param argv - full argv, node binary and script path included
 */
export async function run(argv: readonly string[], io: CliIo): Promise<ExitCode> {
  let exitCode: ExitCode = ExitCodes.SUCCESS;

  const program = new Command()
    .name("tally")
    .description("Replay a transaction log into per-client account balances")
    .version("0.1.0")
    .argument("<transactions>", "path to the CSV transaction log")
    .option("--format <format>", `report format (${REPORT_FORMATS.join("|")})`, "csv")
    .option("--log-level <level>", "override LOG_LEVEL for this run")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action(async (path: string, rawOptions: unknown) => {
      exitCode = await executeReplayCommand(path, rawOptions, io);
    });

  try {
    await program.parseAsync([...argv], { from: "node" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return commanderExitCode(err);
    }
    throw err;
  }

  return exitCode;
}

async function executeReplayCommand(
  path: string,
  rawOptions: unknown,
  io: CliIo,
): Promise<ExitCode> {
  const options = ReplayCommandOptionsSchema.safeParse(rawOptions);
  if (!options.success) {
    io.stderr(`error: ${formatIssues(options.error)}\n`);
    return ExitCodes.INVALID_ARGS;
  }

  let config: AppConfig;
  try {
    config = loadConfig(io.env);
  } catch (err) {
    if (err instanceof z.ZodError) {
      io.stderr(`error: invalid configuration: ${formatIssues(err)}\n`);
      return ExitCodes.CONFIG_ERROR;
    }
    throw err;
  }

  const logger = createLogger(
    {
      level: options.data.logLevel ?? config.LOG_LEVEL,
      pretty: config.LOG_PRETTY,
    },
    io.logDestination,
  );

  try {
    const { accounts } = await replayFile(path, logger);
    io.stdout(formatAccounts(accounts, options.data.format));
    return ExitCodes.SUCCESS;
  } catch (err) {
    if (err instanceof InputFileError) {
      logger.error({ path: err.path, code: err.code }, err.message);
      return ExitCodes.NOT_FOUND;
    }
    logger.error({ err }, "Replay failed");
    return ExitCodes.GENERAL_ERROR;
  }
}

function commanderExitCode(err: CommanderError): ExitCode {
  if (err.exitCode === 0) {
    return ExitCodes.SUCCESS;
  }
  if (err.code === "commander.missingArgument") {
    return ExitCodes.GENERAL_ERROR;
  }
  return ExitCodes.INVALID_ARGS;
}
