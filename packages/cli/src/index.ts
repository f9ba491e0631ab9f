/**
 * @tally/cli — Delimited-text surface for the replay engine.
 *
 * Reads a CSV transaction log, replays it through @tally/ledger and
 * renders the resulting accounts.
 */

export { run, ReplayCommandOptionsSchema } from "./cli.js";
export type { CliIo, ReplayCommandOptions } from "./cli.js";
export { loadConfig, ConfigSchema, LogLevelSchema, formatIssues } from "./config.js";
export type { AppConfig, LogLevel } from "./config.js";
export { createLogger } from "./logger.js";
export type { LoggerOptions } from "./logger.js";
export { ExitCodes } from "./exit-codes.js";
export type { ExitCode } from "./exit-codes.js";
export { InputFileError } from "./errors.js";
export type { InputFileErrorCode } from "./errors.js";
export { readCsvRecords, openTransactionFile, isCsvRecordError } from "./csv-reader.js";
export type { CsvEntry, CsvRecord, CsvRecordError } from "./csv-reader.js";
export { decodeTransactionRow, TransactionRowSchema } from "./transaction-row.js";
export type { DecodeResult } from "./transaction-row.js";
export {
  formatAccounts,
  formatAccountsCsv,
  formatAccountsJson,
  REPORT_FORMATS,
} from "./account-writer.js";
export type { ReportFormat } from "./account-writer.js";
export { replayRecords, replayFile } from "./replay.js";
export type { ReplayResult, ReplaySummary } from "./replay.js";
