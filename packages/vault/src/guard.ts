/**
 * @chronovault/vault — Reentrancy guard.
 *
 * The guard flag lives in the vault record. Acquiring it stages the
 * flag in the transaction's working copy, so any nested call that
 * reaches this vault before the outer operation finishes reads `true`
 * and fails. Releasing stages the final state with the flag cleared.
 *
 * Nothing here is durable until the host commits; a failed operation
 * leaves the committed flag as it was.
 */

import type { AccountInfo } from "@chronovault/runtime";
import { VaultError } from "./errors.js";
import { encodeVault } from "./state.js";
import type { Vault } from "./types.js";

export function acquireGuard(account: AccountInfo, vault: Vault): Vault {
  if (vault.reentrancyGuard) {
    throw new VaultError(
      "REENTRANCY_DETECTED",
      `Vault ${account.address} is already mid-operation`,
    );
  }
  const guarded: Vault = { ...vault, reentrancyGuard: true };
  account.setData(encodeVault(guarded));
  return guarded;
}

/** Persist `vault` with the guard cleared. */
export function releaseGuard(account: AccountInfo, vault: Vault): void {
  account.setData(encodeVault({ ...vault, reentrancyGuard: false }));
}
