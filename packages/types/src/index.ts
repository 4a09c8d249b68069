/**
 * @chronovault/types — Shared domain types for the Chronovault stack.
 *
 * These types are used across all Chronovault packages:
 * - Identities and timestamps
 * - Instructions, account references, and transactions
 * - Token balance records
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Identity types
export type { Address, Timestamp } from "./identity.js";
export { ADDRESS_LENGTH, U64_MAX, I64_MIN, I64_MAX } from "./identity.js";

// Instruction types
export type { AccountMeta, Instruction, Transaction } from "./instruction.js";

// Token types
export type { TokenAccount } from "./token.js";

// Runtime type guards
export {
  isAddress,
  isU64,
  isI64,
  isAccountMeta,
  isInstruction,
  isTokenAccount,
} from "./guards.js";
