/**
 * @tally/ledger — Transaction replay engine.
 *
 * A pure TypeScript state machine with zero runtime dependencies.
 * Replays deposits, withdrawals, disputes, resolves and chargebacks
 * into per-client balances:
 * - total === available + held after every transaction
 * - A chargeback locks the account for good
 * - Disputes act on the original deposit's owner
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - Inapplicable transactions are silent no-ops
 * - Stores are owned by one engine instance, no ambient state
 * - Zero runtime dependencies beyond @tally/types
 */

// Core engine
export { TransactionEngine } from "./engine.js";
export type { EngineOptions } from "./engine.js";

// Stores
export { AccountStore, toSnapshot } from "./accounts.js";
export { TransactionLedger } from "./transaction-ledger.js";

// Money arithmetic
export { parseAmount, tryParseAmount, formatAmount } from "./money-math.js";

// Types
export type {
  ClientAccount,
  DisputeState,
  LedgerEntry,
  IgnoreReason,
  ApplyOutcome,
  OutcomeHandler,
  LedgerErrorCode,
} from "./types.js";

export {
  AMOUNT_DECIMALS,
  DISPUTE_TRANSITIONS,
  LedgerError,
  canTransition,
} from "./types.js";
