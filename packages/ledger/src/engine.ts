/**
 * @tally/ledger — Transaction engine.
 *
 * Replays transactions one at a time, in input order, against an
 * AccountStore and a TransactionLedger that it owns exclusively.
 *
 * API surface:
 * - apply() — Apply one transaction (the only write operation)
 * - snapshot() — Copy every account referenced so far
 * - getAccount() — Snapshot of a single account
 * - getLedgerEntry() — Retained deposit record and its dispute state
 *
 * Inapplicable transactions (unknown tx, wrong dispute state, locked
 * account, insufficient funds) are absorbed as no-ops. Nothing is
 * reported to the caller; the optional onOutcome hook sees each result.
 */

import type {
  AccountSnapshot,
  ClientId,
  Chargeback,
  Deposit,
  Dispute,
  Resolve,
  Transaction,
  TxId,
  Withdrawal,
} from "@tally/types";
import { AccountStore, toSnapshot } from "./accounts.js";
import { TransactionLedger } from "./transaction-ledger.js";
import { tryParseAmount } from "./money-math.js";
import type { ApplyOutcome, IgnoreReason, LedgerEntry, OutcomeHandler } from "./types.js";
import { canTransition } from "./types.js";

/**
 * Construction options. Stores default to fresh, empty instances.
 */
export interface EngineOptions {
  readonly accounts?: AccountStore | undefined;
  readonly ledger?: TransactionLedger | undefined;
  readonly onOutcome?: OutcomeHandler | undefined;
}

/**
 * Deposit/withdrawal accounting with a dispute → resolve | chargeback
 * lifecycle per deposit.
 *
 * Invariant after every apply(): total === available + held for every
 * account. A locked account stays locked.
 */
export class TransactionEngine {
  private readonly _accounts: AccountStore;
  private readonly _ledger: TransactionLedger;
  private readonly _onOutcome: OutcomeHandler | undefined;

  constructor(options: EngineOptions = {}) {
    this._accounts = options.accounts ?? new AccountStore();
    this._ledger = options.ledger ?? new TransactionLedger();
    this._onOutcome = options.onOutcome;
  }

  // ─── Apply ───────────────────────────────────────────────────────────

  /**
   * Apply a single transaction.
   */
  apply(transaction: Transaction): void {
    const outcome = this._dispatch(transaction);
    this._onOutcome?.(outcome);
  }

  private _dispatch(tx: Transaction): ApplyOutcome {
    switch (tx.kind) {
      case "deposit":
        return this._deposit(tx);
      case "withdrawal":
        return this._withdrawal(tx);
      case "dispute":
        return this._dispute(tx);
      case "resolve":
        return this._resolve(tx);
      case "chargeback":
        return this._chargeback(tx);
    }
  }

  // ─── Handlers ────────────────────────────────────────────────────────

  private _deposit(tx: Deposit): ApplyOutcome {
    const amount = tryParseAmount(tx.amount);
    if (amount === undefined) {
      return ignored(tx, "invalid-amount");
    }

    const account = this._accounts.getOrCreate(tx.clientId);
    if (account.locked) {
      return ignored(tx, "account-locked");
    }

    account.available += amount;
    account.total += amount;

    this._ledger.record(tx.txId, {
      clientId: tx.clientId,
      txId: tx.txId,
      amount,
      state: "none",
      chargedBack: false,
    });

    return applied(tx);
  }

  private _withdrawal(tx: Withdrawal): ApplyOutcome {
    const amount = tryParseAmount(tx.amount);
    if (amount === undefined) {
      return ignored(tx, "invalid-amount");
    }

    const account = this._accounts.getOrCreate(tx.clientId);
    if (account.locked) {
      return ignored(tx, "account-locked");
    }
    if (account.available < amount) {
      return ignored(tx, "insufficient-funds");
    }

    account.available -= amount;
    account.total -= amount;

    return applied(tx);
  }

  private _dispute(tx: Dispute): ApplyOutcome {
    const entry = this._ledger.lookup(tx.txId);
    if (entry === undefined) {
      return ignored(tx, "unknown-transaction");
    }
    if (entry.chargedBack) {
      return ignored(tx, "charged-back");
    }
    if (!canTransition(entry.state, "disputed")) {
      return ignored(tx, "already-disputed");
    }

    // The deposit's owner, not tx.clientId
    const account = this._accounts.getOrCreate(entry.clientId);
    account.available -= entry.amount;
    account.held += entry.amount;

    this._ledger.record(tx.txId, { ...entry, state: "disputed" });
    return applied(tx);
  }

  private _resolve(tx: Resolve): ApplyOutcome {
    const entry = this._disputedEntry(tx.txId);
    if (!isEntry(entry)) {
      return ignored(tx, entry);
    }

    const account = this._accounts.getOrCreate(entry.clientId);
    account.available += entry.amount;
    account.held -= entry.amount;

    this._ledger.record(tx.txId, { ...entry, state: "none" });
    return applied(tx);
  }

  private _chargeback(tx: Chargeback): ApplyOutcome {
    const entry = this._disputedEntry(tx.txId);
    if (!isEntry(entry)) {
      return ignored(tx, entry);
    }

    const account = this._accounts.getOrCreate(entry.clientId);
    account.total -= entry.amount;
    account.held -= entry.amount;
    account.locked = true;

    this._ledger.record(tx.txId, { ...entry, state: "none", chargedBack: true });
    return applied(tx);
  }

  /**
   * Find the entry a resolve or chargeback may act on,
   * or the reason there is none.
   */
  private _disputedEntry(txId: TxId): LedgerEntry | IgnoreReason {
    const entry = this._ledger.lookup(txId);
    if (entry === undefined) {
      return "unknown-transaction";
    }
    if (!canTransition(entry.state, "none")) {
      return "not-disputed";
    }
    return entry;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Copy every account referenced so far. Order is not guaranteed.
   */
  snapshot(): readonly AccountSnapshot[] {
    return this._accounts.snapshot();
  }

  getAccount(clientId: ClientId): AccountSnapshot | undefined {
    const account = this._accounts.get(clientId);
    return account === undefined ? undefined : toSnapshot(account);
  }

  getLedgerEntry(txId: TxId): LedgerEntry | undefined {
    return this._ledger.lookup(txId);
  }

  get accountCount(): number {
    return this._accounts.size;
  }

  get entryCount(): number {
    return this._ledger.size;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function applied(transaction: Transaction): ApplyOutcome {
  return { status: "applied", transaction };
}

function ignored(transaction: Transaction, reason: IgnoreReason): ApplyOutcome {
  return { status: "ignored", transaction, reason };
}

function isEntry(value: LedgerEntry | IgnoreReason): value is LedgerEntry {
  return typeof value !== "string";
}
