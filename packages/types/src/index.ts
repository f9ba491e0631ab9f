/**
 * @tally/types — Shared domain types for the tally stack.
 *
 * Used by the ledger core and by the command-line surface:
 * - Transaction records (the engine's input)
 * - Account snapshots (the engine's output)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are strings; arithmetic lives in @tally/ledger
 */

// Transaction types
export type {
  ClientId,
  TxId,
  Amount,
  TransactionKind,
  Deposit,
  Withdrawal,
  Dispute,
  Resolve,
  Chargeback,
  Transaction,
  FundsTransaction,
} from "./transaction.js";

// Account types
export type { AccountSnapshot } from "./account.js";

// Runtime type guards
export {
  TRANSACTION_KINDS,
  MAX_CLIENT_ID,
  MAX_TX_ID,
  isTransactionKind,
  isClientId,
  isTxId,
  isAmount,
  isTransaction,
  hasAmount,
  isAccountSnapshot,
} from "./guards.js";
