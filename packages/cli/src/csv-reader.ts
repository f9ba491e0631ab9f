/**
 * @tally/cli — CSV transaction log reader.
 *
 * Streams records out of a delimited transaction log with csv-parse.
 * Records keep the source line number for diagnostics.
 */

import { open, stat } from "node:fs/promises";
import type { Readable } from "node:stream";
import { parse } from "csv-parse";
import { z } from "zod";
import { InputFileError } from "./errors.js";

/**
 * One raw record keyed by header name.
 */
export interface CsvRecord {
  /** 1-based line in the source where the record ends */
  readonly line: number;
  readonly record: Readonly<Record<string, string | undefined>>;
}

/**
 * A record csv-parse could not split into fields (stray quote,
 * too many columns). It is skipped; the rest of the log still parses.
 */
export interface CsvRecordError {
  readonly line: number;
  readonly error: string;
}

export type CsvEntry = CsvRecord | CsvRecordError;

export function isCsvRecordError(entry: CsvEntry): entry is CsvRecordError {
  return "error" in entry;
}

const ParsedChunkSchema = z.object({
  record: z.record(z.string(), z.string().optional()),
  info: z.object({ lines: z.number() }),
});

/**
 * Read records from a stream of CSV text.
 *
 * Headers are taken from the first line. Fields are trimmed, blank lines
 * are skipped and short rows (a dispute without an amount column) are
 * accepted. Rows with extra fields or broken quoting come out as
 * CsvRecordError entries.
 */
export async function* readCsvRecords(input: Readable): AsyncGenerator<CsvEntry> {
  const parser = parse({
    columns: true,
    trim: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count_less: true,
    skip_records_with_error: true,
    info: true,
  });

  const skipped: CsvRecordError[] = [];
  parser.on("skip", (err: unknown) => {
    skipped.push({
      line: parser.info.lines,
      error: err instanceof Error ? err.message : String(err),
    });
  });

  input.on("error", (err) => parser.destroy(err));
  input.pipe(parser);

  try {
    const chunks: AsyncIterable<unknown> = parser;
    for await (const chunk of chunks) {
      yield* skipped.splice(0);
      const { record, info } = ParsedChunkSchema.parse(chunk);
      yield { line: info.lines, record };
    }
    yield* skipped.splice(0);
  } finally {
    input.destroy();
  }
}

/**
 * Open a transaction log on disk.
 *
 * @throws {InputFileError} if the path is missing, not a regular file
 * or cannot be opened for reading
 */
export async function openTransactionFile(path: string): Promise<Readable> {
  const stats = await stat(path).catch((err: unknown) => {
    throw new InputFileError(fileErrorCode(err), path, err);
  });

  if (!stats.isFile()) {
    throw new InputFileError("NOT_A_FILE", path);
  }

  const handle = await open(path, "r").catch((err: unknown) => {
    throw new InputFileError(fileErrorCode(err), path, err);
  });

  return handle.createReadStream({ encoding: "utf-8" });
}

function fileErrorCode(err: unknown): "NOT_FOUND" | "UNREADABLE" {
  return isErrnoException(err) && err.code === "ENOENT" ? "NOT_FOUND" : "UNREADABLE";
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
