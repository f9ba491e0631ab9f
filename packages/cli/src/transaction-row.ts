/**
 * @tally/cli — Transaction row decoding.
 *
 * Turns one CSV record (`type, client, tx, amount`) into a typed
 * Transaction. Malformed rows never reach the engine.
 *
 * Rules:
 * - Deposits and withdrawals must carry an amount
 * - Amounts are non-negative with at most four fractional digits
 * - An amount on a dispute, resolve or chargeback row is dropped
 */

import { z } from "zod";
import type { Transaction } from "@tally/types";
import { isAmount, MAX_CLIENT_ID, MAX_TX_ID, TRANSACTION_KINDS } from "@tally/types";
import { formatIssues } from "./config.js";

// =============================================================================
// Schema
// =============================================================================

function integerColumn(max: number) {
  return z
    .string()
    .regex(/^\d+$/, "must be a non-negative integer")
    .transform(Number)
    .pipe(z.number().int().max(max));
}

const RawRowSchema = z.object({
  type: z.enum(TRANSACTION_KINDS),
  client: integerColumn(MAX_CLIENT_ID),
  tx: integerColumn(MAX_TX_ID),
  amount: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === "" ? undefined : v)),
});

export const TransactionRowSchema = RawRowSchema.transform(
  (row, ctx): Transaction => {
    switch (row.type) {
      case "deposit":
      case "withdrawal": {
        if (row.amount === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["amount"],
            message: `${row.type} requires an amount`,
          });
          return z.NEVER;
        }
        if (!isAmount(row.amount)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["amount"],
            message: `"${row.amount}" is not a non-negative amount with at most 4 decimal places`,
          });
          return z.NEVER;
        }
        return { kind: row.type, clientId: row.client, txId: row.tx, amount: row.amount };
      }
      case "dispute":
      case "resolve":
      case "chargeback":
        return { kind: row.type, clientId: row.client, txId: row.tx };
    }
  },
);

// =============================================================================
// Decoding
// =============================================================================

export type DecodeResult =
  | { readonly ok: true; readonly transaction: Transaction }
  | { readonly ok: false; readonly error: string };

/**
 * Decode one CSV record. Never throws.
 */
export function decodeTransactionRow(
  record: Readonly<Record<string, string | undefined>>,
): DecodeResult {
  const result = TransactionRowSchema.safeParse(record);
  if (!result.success) {
    return { ok: false, error: formatIssues(result.error) };
  }
  return { ok: true, transaction: result.data };
}
