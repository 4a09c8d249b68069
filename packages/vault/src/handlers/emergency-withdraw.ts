/**
 * EmergencyWithdraw: release a deposit before its unlock time.
 *
 * Accounts: [authority (signer), vault (writable), destination (writable),
 *            source (writable), ledger program, depositor, ...forwarded]
 *
 * Only the vault's emergency authority may call this, and the funds
 * still go to the depositor: the depositor reference must match the
 * deposit and the destination token account must be owned by them.
 * No unlock-time check.
 */

import { readTokenAccount } from "@chronovault/ledger";
import { RuntimeError } from "@chronovault/runtime";
import type { AccountInfo, InvokeContext } from "@chronovault/runtime";
import {
  requireDepositor,
  requireEmergencyAuthority,
  requireOwnedBy,
  requireProgram,
  requireSigner,
} from "../authorization.js";
import { VaultError } from "../errors.js";
import { acquireGuard } from "../guard.js";
import { decodeVault } from "../state.js";
import type { VaultProgramConfig } from "../types.js";
import { releaseDeposit, requireDeposit, requireNotWithdrawn } from "./release.js";

export function processEmergencyWithdraw(
  ctx: InvokeContext,
  accounts: readonly AccountInfo[],
  depositId: bigint,
  config: VaultProgramConfig,
): void {
  const [authority, vaultAccount, destination, source, ledgerProgram, depositor, ...remaining] =
    accounts;
  if (
    authority === undefined ||
    vaultAccount === undefined ||
    destination === undefined ||
    source === undefined ||
    ledgerProgram === undefined ||
    depositor === undefined
  ) {
    throw new RuntimeError(
      "NOT_ENOUGH_ACCOUNT_KEYS",
      "EmergencyWithdraw needs [authority, vault, destination, source, ledger, depositor]",
    );
  }

  requireSigner(authority, "Emergency authority");
  requireOwnedBy(vaultAccount, ctx.programId);
  requireProgram(ledgerProgram, config.ledgerProgramId);

  const vault = acquireGuard(vaultAccount, decodeVault(vaultAccount.data));
  requireEmergencyAuthority(vault, authority.address);

  const deposit = requireDeposit(vault, depositId);
  requireNotWithdrawn(deposit);
  requireDepositor(deposit, depositor.address);

  const payee = readTokenAccount(destination, config.ledgerProgramId);
  if (payee.owner !== deposit.depositor) {
    throw new VaultError(
      "UNAUTHORIZED_WITHDRAWAL",
      `Destination ${destination.address} is not owned by depositor ${deposit.depositor}`,
    );
  }

  releaseDeposit(ctx, { vault: vaultAccount, destination, source, remaining }, vault, deposit, config);
  ctx.log(
    `Emergency withdrawal of ${deposit.amount.toString()} from deposit ${deposit.id.toString()}`,
  );
}
