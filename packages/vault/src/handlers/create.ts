/**
 * Create: initialize an empty vault in program-owned storage.
 *
 * Accounts: [owner (signer), vault (writable)]
 */

import { RuntimeError } from "@chronovault/runtime";
import type { AccountInfo, InvokeContext } from "@chronovault/runtime";
import { requireOwnedBy, requireSigner } from "../authorization.js";
import { VaultError } from "../errors.js";
import { encodeVault, newVault } from "../state.js";

export function processCreate(ctx: InvokeContext, accounts: readonly AccountInfo[]): void {
  const [owner, vaultAccount] = accounts;
  if (owner === undefined || vaultAccount === undefined) {
    throw new RuntimeError("NOT_ENOUGH_ACCOUNT_KEYS", "Create needs [owner, vault]");
  }

  requireSigner(owner, "Owner");
  requireOwnedBy(vaultAccount, ctx.programId);

  if (!vaultAccount.isEmpty) {
    throw new VaultError(
      "ACCOUNT_ALREADY_IN_USE",
      `Vault account ${vaultAccount.address} is already initialized`,
    );
  }

  vaultAccount.setData(encodeVault(newVault(owner.address)));
  ctx.log("Vault created");
}
