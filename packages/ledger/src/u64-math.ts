/**
 * @chronovault/ledger — Checked u64 token arithmetic.
 *
 * Balances are raw integer units (u64). Display helpers convert between
 * raw units and decimal strings via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Every result stays within [0, 2^64 - 1] or the call throws
 * - Amount strings must be valid non-negative decimals
 */

import { U64_MAX, isU64 } from "@chronovault/types";
import { LedgerError } from "./types.js";

// ─── Checked arithmetic ──────────────────────────────────────────────────

/**
 * Assert a value fits in u64. Returns it unchanged.
 */
export function assertU64(value: bigint): bigint {
  if (!isU64(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Amount out of u64 range: ${String(value)}`);
  }
  return value;
}

/**
 * a + b, failing on u64 overflow.
 */
export function checkedAddU64(a: bigint, b: bigint): bigint {
  const sum = assertU64(a) + assertU64(b);
  if (sum > U64_MAX) {
    throw new LedgerError(
      "OVERFLOW",
      `${a.toString()} + ${b.toString()} overflows u64`,
    );
  }
  return sum;
}

/**
 * a - b, failing when b exceeds a.
 */
export function checkedSubU64(a: bigint, b: bigint): bigint {
  if (assertU64(b) > assertU64(a)) {
    throw new LedgerError(
      "INSUFFICIENT_FUNDS",
      `Cannot take ${b.toString()} from ${a.toString()}`,
    );
  }
  return a - b;
}

// ─── Display ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string into raw units scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (trimmed === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${amount}"`);
  }

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return assertU64(BigInt(intPart + fracPart.padEnd(decimals, "0")));
}

/**
 * Format raw units as a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 5n with decimals=0 → "5"
 */
export function formatAmount(units: bigint, decimals: number): string {
  assertU64(units);
  if (decimals === 0) {
    return units.toString();
  }

  const str = units.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}
