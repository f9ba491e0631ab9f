/**
 * Runtime Type Guards
 *
 * Narrowing functions for tally domain types.
 * These enable safe runtime validation at system boundaries
 * (decoded CSV rows, deserialized snapshots, programmatic callers).
 */

import type { AccountSnapshot } from "./account.js";
import type {
  Amount,
  ClientId,
  FundsTransaction,
  Transaction,
  TransactionKind,
  TxId,
} from "./transaction.js";

// =============================================================================
// Identifier guards
// =============================================================================

export const TRANSACTION_KINDS = [
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
] as const satisfies readonly TransactionKind[];

const KIND_SET = new Set<string>(TRANSACTION_KINDS);

/** Largest client id the log format can carry (u16). */
export const MAX_CLIENT_ID = 0xffff;

/** Largest transaction id the log format can carry (u32). */
export const MAX_TX_ID = 0xffffffff;

const AMOUNT_PATTERN = /^\d+(\.\d{1,4})?$/;

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && KIND_SET.has(value);
}

export function isClientId(value: unknown): value is ClientId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CLIENT_ID
  );
}

export function isTxId(value: unknown): value is TxId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_TX_ID
  );
}

/** Non-negative decimal string with at most four fractional digits. */
export function isAmount(value: unknown): value is Amount {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

// =============================================================================
// Transaction guards
// =============================================================================

export function isTransaction(value: unknown): value is Transaction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isTransactionKind(v.kind) || !isClientId(v.clientId) || !isTxId(v.txId)) {
    return false;
  }
  if (v.kind === "deposit" || v.kind === "withdrawal") {
    return isAmount(v.amount);
  }
  return v.amount === undefined;
}

/** Narrow to the kinds that carry an amount. */
export function hasAmount(tx: Transaction): tx is FundsTransaction {
  return tx.kind === "deposit" || tx.kind === "withdrawal";
}

// =============================================================================
// Account guards
// =============================================================================

const BALANCE_PATTERN = /^-?\d+\.\d{4}$/;

export function isAccountSnapshot(value: unknown): value is AccountSnapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isClientId(v.client) &&
    typeof v.available === "string" &&
    BALANCE_PATTERN.test(v.available) &&
    typeof v.held === "string" &&
    BALANCE_PATTERN.test(v.held) &&
    typeof v.total === "string" &&
    BALANCE_PATTERN.test(v.total) &&
    typeof v.locked === "boolean"
  );
}
