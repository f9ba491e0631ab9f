/**
 * Tests for the deterministic money math helpers.
 *
 * Covers:
 * - parseAmount / formatAmount at the default precision
 * - Non-throwing parsing for engine input
 * - Validation and error cases
 */

import { describe, it, expect } from "vitest";
import { parseAmount, tryParseAmount, formatAmount } from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("scales a whole number to four decimals by default", () => {
    expect(parseAmount("100")).toBe(1_000_000n);
  });

  it("pads a short fractional part", () => {
    expect(parseAmount("1.5")).toBe(15_000n);
  });

  it("keeps four fractional digits exactly", () => {
    expect(parseAmount("2.7182")).toBe(27_182n);
  });

  it("honours an explicit decimals argument", () => {
    expect(parseAmount("100.50", 2)).toBe(10_050n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-50.25")).toBe(-502_500n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseAmount("  3.0 ")).toBe(30_000n);
  });

  it("rejects more fractional digits than allowed", () => {
    expect(() => parseAmount("0.00001")).toThrow(LedgerError);
    expect(() => parseAmount("0.00001")).toThrow(/5 decimal places/);
  });

  it("rejects malformed strings", () => {
    expect(() => parseAmount("")).toThrow(LedgerError);
    expect(() => parseAmount("abc")).toThrow(/Invalid amount format/);
    expect(() => parseAmount("1e5")).toThrow(LedgerError);
    expect(() => parseAmount("1.")).toThrow(LedgerError);
  });

  it("tags errors with INVALID_AMOUNT", () => {
    let caught: unknown;
    try {
      parseAmount("nope");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LedgerError);
    expect(caught).toMatchObject({ code: "INVALID_AMOUNT" });
  });
});

// ─── tryParseAmount ──────────────────────────────────────────────────────

describe("tryParseAmount", () => {
  it("returns the scaled value for valid amounts", () => {
    expect(tryParseAmount("10.0")).toBe(100_000n);
    expect(tryParseAmount("0")).toBe(0n);
  });

  it("returns undefined for negatives", () => {
    expect(tryParseAmount("-1")).toBeUndefined();
  });

  it("returns undefined for excess precision", () => {
    expect(tryParseAmount("1.23456")).toBeUndefined();
  });

  it("returns undefined for non-strings and garbage", () => {
    expect(tryParseAmount(10)).toBeUndefined();
    expect(tryParseAmount(undefined)).toBeUndefined();
    expect(tryParseAmount("ten")).toBeUndefined();
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats with four fractional digits by default", () => {
    expect(formatAmount(100_000n)).toBe("10.0000");
  });

  it("formats values below one", () => {
    expect(formatAmount(5n)).toBe("0.0005");
  });

  it("formats zero", () => {
    expect(formatAmount(0n)).toBe("0.0000");
  });

  it("formats negatives", () => {
    expect(formatAmount(-400_000n)).toBe("-40.0000");
  });

  it("formats with zero decimals", () => {
    expect(formatAmount(42n, 0)).toBe("42");
  });

  it("inverts parseAmount", () => {
    expect(formatAmount(parseAmount("123.4567"))).toBe("123.4567");
  });
});
