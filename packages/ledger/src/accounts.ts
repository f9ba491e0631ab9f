/**
 * @tally/ledger — Account store.
 *
 * Maps client ids to live balance state. Accounts are created lazily
 * with zero balances the first time a client is referenced.
 *
 * Rules:
 * - Accounts are never removed
 * - Creation never fails
 * - Snapshots are copies; mutating them does not touch the store
 */

import type { AccountSnapshot, ClientId } from "@tally/types";
import type { ClientAccount } from "./types.js";
import { formatAmount } from "./money-math.js";

/**
 * Convert live account state into its formatted, immutable form.
 */
export function toSnapshot(account: ClientAccount): AccountSnapshot {
  return {
    client: account.clientId,
    available: formatAmount(account.available),
    held: formatAmount(account.held),
    total: formatAmount(account.total),
    locked: account.locked,
  };
}

/**
 * Registry of client accounts, owned by a single TransactionEngine.
 */
export class AccountStore {
  private readonly _accounts: Map<ClientId, ClientAccount> = new Map();

  /**
   * Get the account for a client, creating a zero-balance one if absent.
   */
  getOrCreate(clientId: ClientId): ClientAccount {
    let account = this._accounts.get(clientId);

    if (account === undefined) {
      account = {
        clientId,
        available: 0n,
        held: 0n,
        total: 0n,
        locked: false,
      };
      this._accounts.set(clientId, account);
    }

    return account;
  }

  /**
   * Get an account by client id.
   * Returns undefined if the client was never referenced.
   */
  get(clientId: ClientId): ClientAccount | undefined {
    return this._accounts.get(clientId);
  }

  has(clientId: ClientId): boolean {
    return this._accounts.has(clientId);
  }

  get size(): number {
    return this._accounts.size;
  }

  /**
   * Copy every tracked account. Order is not guaranteed.
   */
  snapshot(): readonly AccountSnapshot[] {
    return [...this._accounts.values()].map(toSnapshot);
  }
}
