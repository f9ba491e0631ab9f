/**
 * Transaction Types
 *
 * The records fed into the replay engine, one per call.
 *
 * Rules:
 * - Amounts are decimal strings, never JS numbers
 * - Only deposits and withdrawals carry an amount
 * - Dispute, resolve and chargeback reference a prior deposit by txId
 */

/** Client identifier (u16 in the transaction log). */
export type ClientId = number;

/** Transaction identifier (u32 in the transaction log), unique per log. */
export type TxId = number;

/**
 * A non-negative decimal amount, e.g. "1.5" or "10.0000".
 * At most four fractional digits.
 */
export type Amount = string;

/** Discriminant of the transaction union. */
export type TransactionKind =
  | "deposit"
  | "withdrawal"
  | "dispute"
  | "resolve"
  | "chargeback";

/** Credit funds to a client account. The only disputable kind. */
export interface Deposit {
  readonly kind: "deposit";
  readonly clientId: ClientId;
  readonly txId: TxId;
  readonly amount: Amount;
}

/** Debit funds from a client account, if enough are available. */
export interface Withdrawal {
  readonly kind: "withdrawal";
  readonly clientId: ClientId;
  readonly txId: TxId;
  readonly amount: Amount;
}

/** Open a dispute against an earlier deposit. */
export interface Dispute {
  readonly kind: "dispute";
  readonly clientId: ClientId;
  readonly txId: TxId;
}

/** Close an open dispute, releasing the held funds. */
export interface Resolve {
  readonly kind: "resolve";
  readonly clientId: ClientId;
  readonly txId: TxId;
}

/** Close an open dispute by reversing the deposit and locking the account. */
export interface Chargeback {
  readonly kind: "chargeback";
  readonly clientId: ClientId;
  readonly txId: TxId;
}

export type Transaction = Deposit | Withdrawal | Dispute | Resolve | Chargeback;

/** Transactions that move funds directly and therefore carry an amount. */
export type FundsTransaction = Deposit | Withdrawal;
