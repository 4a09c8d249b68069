/**
 * @chronovault/ledger — Types for the token ledger program.
 *
 * Rules:
 * - All types are readonly
 * - Balances are u64 bigint; arithmetic is checked
 * - Fail-closed: invalid requests throw, never silently succeed
 */

import { addressFromLabel } from "@chronovault/runtime";
import type { Address } from "@chronovault/types";

// ─── Identity ────────────────────────────────────────────────────────────

/** Well-known id the ledger program is registered under. */
export const LEDGER_PROGRAM_ID: Address = addressFromLabel("chronovault:ledger");

// ─── Layout ──────────────────────────────────────────────────────────────

/** Encoded size of a token account: mint (32) + owner (32) + amount (8). */
export const TOKEN_ACCOUNT_SIZE = 72;

// ─── Instructions ────────────────────────────────────────────────────────

/**
 * Instructions the ledger program accepts.
 *
 * - initializeAccount: `[account(w)]`
 * - mintTo: `[account(w), mint(s)]`; the mint identity is its own authority
 * - transfer: `[source(w), destination(w), authority(s), ...extra]`
 */
export type LedgerInstruction =
  | { readonly kind: "initializeAccount"; readonly mint: Address; readonly owner: Address }
  | { readonly kind: "mintTo"; readonly amount: bigint }
  | { readonly kind: "transfer"; readonly amount: bigint };

/** Wire tag for each instruction kind. */
export const LEDGER_INSTRUCTION_TAG = {
  initializeAccount: 0,
  mintTo: 1,
  transfer: 2,
} as const satisfies Record<LedgerInstruction["kind"], number>;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_INSTRUCTION"
  | "ACCOUNT_ALREADY_INITIALIZED"
  | "UNINITIALIZED_ACCOUNT"
  | "MINT_MISMATCH"
  | "OWNER_MISMATCH"
  | "MISSING_AUTHORITY_SIGNATURE"
  | "INSUFFICIENT_FUNDS"
  | "OVERFLOW"
  | "INVALID_AMOUNT";

/**
 * Structured error from the ledger program.
 * Always thrown.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
