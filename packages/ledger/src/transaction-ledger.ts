/**
 * @tally/ledger — Dispute ledger.
 *
 * Keeps the retained record of every deposit together with its
 * dispute state. It is the only audit trail disputes act on.
 *
 * Rules:
 * - Only deposits are recorded
 * - Entries persist for the whole run
 * - A state change is persisted by recording a replacement entry
 */

import type { TxId } from "@tally/types";
import type { LedgerEntry } from "./types.js";
import { LedgerError } from "./types.js";

export class TransactionLedger {
  private readonly _entries: Map<TxId, LedgerEntry> = new Map();

  /**
   * Insert or overwrite the entry for a transaction id.
   * Throws if the entry belongs to a different transaction.
   */
  record(txId: TxId, entry: LedgerEntry): void {
    if (entry.txId !== txId) {
      throw new LedgerError(
        "TX_ID_MISMATCH",
        `Entry for transaction ${String(entry.txId)} cannot be recorded under ${String(txId)}`,
      );
    }
    this._entries.set(txId, entry);
  }

  /**
   * Look up an entry. Undefined is the normal answer for unknown ids
   * and for transactions that were never deposits.
   */
  lookup(txId: TxId): LedgerEntry | undefined {
    return this._entries.get(txId);
  }

  has(txId: TxId): boolean {
    return this._entries.has(txId);
  }

  get size(): number {
    return this._entries.size;
  }

  entries(): readonly LedgerEntry[] {
    return [...this._entries.values()];
  }
}
