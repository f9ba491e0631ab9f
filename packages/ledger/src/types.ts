/**
 * @tally/ledger — Internal types for the replay engine.
 *
 * These extend the shared @tally/types with engine-specific
 * structures: mutable account state, dispute entries and outcomes.
 *
 * Rules:
 * - Balances are bigint scaled by AMOUNT_DECIMALS
 * - Ledger entries are readonly; a state change records a new entry
 * - The engine never throws for inapplicable transactions
 */

import type { ClientId, Transaction, TxId } from "@tally/types";

// ─── Precision ───────────────────────────────────────────────────────────

/** Fractional digits carried by every amount and balance. */
export const AMOUNT_DECIMALS = 4;

// ─── Account Types ───────────────────────────────────────────────────────

/**
 * Live balance state of one client, owned by the AccountStore.
 * Only the engine's handlers mutate it.
 */
export interface ClientAccount {
  readonly clientId: ClientId;
  available: bigint;
  held: bigint;
  total: bigint;
  locked: boolean;
}

// ─── Dispute Types ───────────────────────────────────────────────────────

/** Dispute state of a recorded deposit. */
export type DisputeState = "none" | "disputed";

/**
 * Allowed dispute state transitions.
 *
 *   none → disputed       (dispute)
 *   disputed → none       (resolve, chargeback)
 */
export const DISPUTE_TRANSITIONS: Readonly<Record<DisputeState, readonly DisputeState[]>> = {
  none: ["disputed"],
  disputed: ["none"],
} as const;

export function canTransition(from: DisputeState, to: DisputeState): boolean {
  return DISPUTE_TRANSITIONS[from].includes(to);
}

/**
 * The retained record of a deposit.
 * Disputes, resolves and chargebacks act on this, never on the
 * client id of the triggering record.
 */
export interface LedgerEntry {
  readonly clientId: ClientId;
  readonly txId: TxId;
  readonly amount: bigint;
  readonly state: DisputeState;
  /** Set by a chargeback; the deposit can never be disputed again. */
  readonly chargedBack: boolean;
}

// ─── Outcome Types ───────────────────────────────────────────────────────

/** Why a transaction was absorbed as a no-op. */
export type IgnoreReason =
  | "invalid-amount"
  | "account-locked"
  | "insufficient-funds"
  | "unknown-transaction"
  | "already-disputed"
  | "not-disputed"
  | "charged-back";

/**
 * Result of applying one transaction.
 * Never returned from apply(); only handed to an OutcomeHandler.
 */
export type ApplyOutcome =
  | { readonly status: "applied"; readonly transaction: Transaction }
  | {
      readonly status: "ignored";
      readonly transaction: Transaction;
      readonly reason: IgnoreReason;
    };

/** Observation hook for logging and tests. */
export type OutcomeHandler = (outcome: ApplyOutcome) => void;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode = "INVALID_AMOUNT" | "TX_ID_MISMATCH";

/**
 * Structured error from the strict helpers.
 * The engine itself absorbs bad input instead of throwing.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
