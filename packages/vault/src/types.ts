/**
 * Vault Types
 *
 * Domain types for the time-locked custody vault.
 *
 * A vault holds deposits on behalf of their depositors. Each deposit is
 * released exactly once: by its depositor after the unlock time, or by
 * the vault's emergency authority at any time.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Deposits are append-only; ids equal their position in the list
 * - `withdrawn` only ever moves false → true
 * - The reentrancy guard is false whenever no operation is in flight
 */

import { addressFromLabel } from "@chronovault/runtime";
import type { Address, Timestamp } from "@chronovault/types";

// =============================================================================
// Identity
// =============================================================================

/** Well-known id the vault program is registered under. */
export const VAULT_PROGRAM_ID: Address = addressFromLabel("chronovault:vault");

/** Size of a deposit's caller-supplied label. */
export const TAG_LENGTH = 32;

// =============================================================================
// State
// =============================================================================

/**
 * One time-locked unit of custody.
 */
export interface Deposit {
  /** Unique within the vault; assigned from `depositCount` */
  readonly id: bigint;

  /** Who funded the deposit and may withdraw it */
  readonly depositor: Address;

  /** Asset type, as recorded by the ledger for the funding account */
  readonly tokenMint: Address;

  /** Units held (u64, > 0) */
  readonly amount: bigint;

  /** Earliest time an ordinary withdrawal succeeds */
  readonly unlockTime: Timestamp;

  readonly withdrawn: boolean;

  /** Opaque label, exactly TAG_LENGTH bytes */
  readonly tag: Uint8Array;

  readonly createdAt: Timestamp;
}

/**
 * The persisted custody record.
 */
export interface Vault {
  /** Creator of the vault; never changes */
  readonly owner: Address;

  /** Next deposit id; never decreases */
  readonly depositCount: bigint;

  /** Every deposit ever made, in id order */
  readonly deposits: readonly Deposit[];

  readonly reentrancyGuard: boolean;

  /** May bypass the time lock; no instruction sets it */
  readonly emergencyAuthority: Address | null;
}

// =============================================================================
// Instructions
// =============================================================================

export type VaultInstruction =
  | { readonly kind: "create" }
  | {
      readonly kind: "deposit";
      readonly amount: bigint;
      readonly unlockTime: Timestamp;
      readonly tag: Uint8Array;
    }
  | { readonly kind: "withdraw"; readonly depositId: bigint }
  | { readonly kind: "emergencyWithdraw"; readonly depositId: bigint };

/** Wire variant of each instruction kind. */
export const VAULT_INSTRUCTION_TAG = {
  create: 0,
  deposit: 1,
  withdraw: 2,
  emergencyWithdraw: 3,
} as const satisfies Record<VaultInstruction["kind"], number>;

// =============================================================================
// Program configuration
// =============================================================================

/**
 * Collaborators a vault program instance trusts.
 */
export interface VaultProgramConfig {
  /** The only ledger program deposits and withdrawals may go through */
  readonly ledgerProgramId: Address;
}
