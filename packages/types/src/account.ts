/**
 * Account Types
 *
 * The externally visible state of one client account after replay.
 */

import type { ClientId } from "./transaction.js";

/**
 * Point-in-time copy of a client account.
 *
 * Balances are decimal strings with exactly four fractional digits.
 * `total` always equals `available + held`.
 */
export interface AccountSnapshot {
  readonly client: ClientId;

  /** Funds the client may withdraw or have disputed right now */
  readonly available: string;

  /** Funds frozen by open disputes */
  readonly held: string;

  /** available + held */
  readonly total: string;

  /** Set permanently by a chargeback */
  readonly locked: boolean;
}
