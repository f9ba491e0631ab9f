/**
 * @tally/cli — Replay driver.
 *
 * Feeds decoded rows into a TransactionEngine strictly in input order
 * and collects the final account snapshot.
 */

import type { Logger } from "pino";
import type { AccountSnapshot } from "@tally/types";
import { TransactionEngine } from "@tally/ledger";
import type { ApplyOutcome } from "@tally/ledger";
import type { CsvEntry } from "./csv-reader.js";
import { isCsvRecordError, openTransactionFile, readCsvRecords } from "./csv-reader.js";
import { decodeTransactionRow } from "./transaction-row.js";
import type { DecodeResult } from "./transaction-row.js";

export interface ReplaySummary {
  /** Records read from the log */
  readonly rows: number;
  /** Transactions that changed state */
  readonly applied: number;
  /** Well-formed transactions the engine absorbed as no-ops */
  readonly ignored: number;
  /** Malformed rows that never reached the engine */
  readonly rejected: number;
}

export interface ReplayResult {
  readonly accounts: readonly AccountSnapshot[];
  readonly summary: ReplaySummary;
}

/**
 * Replay a stream of CSV records.
 */
export async function replayRecords(
  records: AsyncIterable<CsvEntry>,
  logger: Logger,
): Promise<ReplayResult> {
  const log = logger.child({ component: "replay" });
  let rows = 0;
  let applied = 0;
  let ignored = 0;
  let rejected = 0;

  const engine = new TransactionEngine({
    onOutcome: (outcome: ApplyOutcome) => {
      if (outcome.status === "applied") {
        applied++;
        return;
      }
      ignored++;
      log.debug(
        {
          kind: outcome.transaction.kind,
          client: outcome.transaction.clientId,
          tx: outcome.transaction.txId,
          reason: outcome.reason,
        },
        "Transaction ignored",
      );
    },
  });

  for await (const entry of records) {
    rows++;
    const decoded: DecodeResult = isCsvRecordError(entry)
      ? { ok: false, error: entry.error }
      : decodeTransactionRow(entry.record);
    if (!decoded.ok) {
      rejected++;
      log.warn({ line: entry.line, error: decoded.error }, "Rejected transaction row");
      continue;
    }
    engine.apply(decoded.transaction);
  }

  const summary: ReplaySummary = { rows, applied, ignored, rejected };
  log.info({ ...summary, accounts: engine.accountCount }, "Replay complete");

  return { accounts: engine.snapshot(), summary };
}

/**
 * Replay a transaction log on disk.
 *
 * @throws {InputFileError} if the file cannot be opened
 */
export async function replayFile(path: string, logger: Logger): Promise<ReplayResult> {
  const input = await openTransactionFile(path);
  logger.debug({ path }, "Reading transaction log");
  return replayRecords(readCsvRecords(input), logger);
}
