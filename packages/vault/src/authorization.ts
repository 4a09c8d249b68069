/**
 * @chronovault/vault — Authorization predicates.
 *
 * Each handler names the actors it requires; the checks live here
 * rather than as scattered equality tests.
 *
 *   Create             signer
 *   Deposit            signer (depositor)
 *   Withdraw           signer that is the deposit's depositor
 *   EmergencyWithdraw  signer that is the vault's emergency authority,
 *                      plus a depositor reference matching the deposit
 *   (outgoing funds)   the vault itself, via its derived authority
 *
 * Host-level checks throw RuntimeError; actor mismatches throw
 * UNAUTHORIZED_WITHDRAWAL.
 */

import { RuntimeError, addressToBytes, deriveAddress } from "@chronovault/runtime";
import type { AccountInfo } from "@chronovault/runtime";
import type { Address } from "@chronovault/types";
import { VaultError } from "./errors.js";
import type { Deposit, Vault } from "./types.js";

// ─── Host-level ──────────────────────────────────────────────────────────

export function requireSigner(account: AccountInfo, role: string): void {
  if (!account.isSigner) {
    throw new RuntimeError(
      "MISSING_REQUIRED_SIGNATURE",
      `${role} ${account.address} must sign`,
    );
  }
}

/** The account's storage must belong to `programId`. */
export function requireOwnedBy(account: AccountInfo, programId: Address): void {
  if (account.owner !== programId) {
    throw new RuntimeError(
      "INVALID_ACCOUNT_OWNER",
      `Account ${account.address} is owned by ${account.owner}, expected ${programId}`,
    );
  }
}

/** The account reference must be the given program. */
export function requireProgram(account: AccountInfo, programId: Address): void {
  if (account.address !== programId) {
    throw new RuntimeError(
      "INCORRECT_PROGRAM_ID",
      `Expected program ${programId}, got ${account.address}`,
    );
  }
}

// ─── Actors ──────────────────────────────────────────────────────────────

export function isDepositor(deposit: Deposit, identity: Address): boolean {
  return deposit.depositor === identity;
}

export function isEmergencyAuthority(vault: Vault, identity: Address): boolean {
  return vault.emergencyAuthority !== null && vault.emergencyAuthority === identity;
}

export function requireDepositor(deposit: Deposit, identity: Address): void {
  if (!isDepositor(deposit, identity)) {
    throw new VaultError(
      "UNAUTHORIZED_WITHDRAWAL",
      `${identity} is not the depositor of deposit ${deposit.id.toString()}`,
    );
  }
}

export function requireEmergencyAuthority(vault: Vault, identity: Address): void {
  if (!isEmergencyAuthority(vault, identity)) {
    throw new VaultError(
      "UNAUTHORIZED_WITHDRAWAL",
      vault.emergencyAuthority === null
        ? "Vault has no emergency authority"
        : `${identity} is not the vault's emergency authority`,
    );
  }
}

// ─── Vault as signer ─────────────────────────────────────────────────────

/** Fixed seed byte appended to the vault address when deriving its authority. */
export const VAULT_AUTHORITY_SEED = 0;

export function vaultAuthoritySeeds(vault: Address): readonly Uint8Array[] {
  return [addressToBytes(vault), Uint8Array.of(VAULT_AUTHORITY_SEED)];
}

/**
 * The identity that owns a vault's token accounts. Only the vault
 * program can sign for it, and only for that vault.
 */
export function vaultAuthority(programId: Address, vault: Address): Address {
  return deriveAddress(programId, vaultAuthoritySeeds(vault));
}
