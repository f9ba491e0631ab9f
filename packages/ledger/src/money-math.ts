/**
 * @tally/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Precision is fixed at AMOUNT_DECIMALS unless overridden
 */

import { AMOUNT_DECIMALS, LedgerError } from "./types.js";

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const UNSIGNED_DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" → 1005000n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number = AMOUNT_DECIMALS): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but at most ${String(decimals)} are allowed`,
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Parse a non-negative amount without throwing.
 * Returns undefined for anything parseAmount would reject, and for negatives.
 */
export function tryParseAmount(amount: unknown, decimals: number = AMOUNT_DECIMALS): bigint | undefined {
  if (typeof amount !== "string") {
    return undefined;
  }

  const trimmed = amount.trim();
  if (!UNSIGNED_DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }

  const fracPart = trimmed.split(".")[1] ?? "";
  if (fracPart.length > decimals) {
    return undefined;
  }

  return parseAmount(trimmed, decimals);
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 1005000n → "100.5000"
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number = AMOUNT_DECIMALS): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}
