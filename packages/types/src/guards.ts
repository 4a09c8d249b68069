/**
 * Runtime Type Guards
 *
 * Narrowing functions for the shared domain types.
 * These enable safe runtime validation at system boundaries
 * (decoded account data, instruction builders, test fixtures).
 */

import type { Address } from "./identity.js";
import { I64_MAX, I64_MIN, U64_MAX } from "./identity.js";
import type { AccountMeta, Instruction } from "./instruction.js";
import type { TokenAccount } from "./token.js";

// =============================================================================
// Identity guards
// =============================================================================

const ADDRESS_PATTERN = /^[0-9a-f]{64}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isU64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= U64_MAX;
}

export function isI64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= I64_MIN && value <= I64_MAX;
}

// =============================================================================
// Instruction guards
// =============================================================================

export function isAccountMeta(value: unknown): value is AccountMeta {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAddress(v.address) &&
    typeof v.isSigner === "boolean" &&
    typeof v.isWritable === "boolean"
  );
}

export function isInstruction(value: unknown): value is Instruction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAddress(v.programId) &&
    Array.isArray(v.accounts) &&
    v.accounts.every(isAccountMeta) &&
    v.data instanceof Uint8Array
  );
}

// =============================================================================
// Token guards
// =============================================================================

export function isTokenAccount(value: unknown): value is TokenAccount {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isAddress(v.mint) && isAddress(v.owner) && isU64(v.amount);
}
