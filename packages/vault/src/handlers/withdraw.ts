/**
 * Withdraw: return a deposit to its depositor once unlocked.
 *
 * Accounts: [depositor (signer), vault (writable), destination (writable),
 *            source (writable), ledger program, clock, ...forwarded]
 *
 * Authorization is against the deposit's recorded depositor, never the
 * vault owner.
 */

import { RuntimeError } from "@chronovault/runtime";
import type { AccountInfo, InvokeContext } from "@chronovault/runtime";
import {
  requireDepositor,
  requireOwnedBy,
  requireProgram,
  requireSigner,
} from "../authorization.js";
import { VaultError } from "../errors.js";
import { acquireGuard } from "../guard.js";
import { decodeVault } from "../state.js";
import type { VaultProgramConfig } from "../types.js";
import { releaseDeposit, requireDeposit, requireNotWithdrawn } from "./release.js";

export function processWithdraw(
  ctx: InvokeContext,
  accounts: readonly AccountInfo[],
  depositId: bigint,
  config: VaultProgramConfig,
): void {
  const [depositor, vaultAccount, destination, source, ledgerProgram, clock, ...remaining] =
    accounts;
  if (
    depositor === undefined ||
    vaultAccount === undefined ||
    destination === undefined ||
    source === undefined ||
    ledgerProgram === undefined ||
    clock === undefined
  ) {
    throw new RuntimeError(
      "NOT_ENOUGH_ACCOUNT_KEYS",
      "Withdraw needs [depositor, vault, destination, source, ledger, clock]",
    );
  }

  requireSigner(depositor, "Depositor");
  requireOwnedBy(vaultAccount, ctx.programId);
  requireProgram(ledgerProgram, config.ledgerProgramId);

  const vault = acquireGuard(vaultAccount, decodeVault(vaultAccount.data));
  const deposit = requireDeposit(vault, depositId);
  requireDepositor(deposit, depositor.address);
  requireNotWithdrawn(deposit);

  const now = ctx.now(clock);
  if (now < deposit.unlockTime) {
    throw new VaultError(
      "UNLOCK_TIME_NOT_REACHED",
      `Deposit ${deposit.id.toString()} unlocks at ${deposit.unlockTime.toString()}, now ${now.toString()}`,
    );
  }

  releaseDeposit(ctx, { vault: vaultAccount, destination, source, remaining }, vault, deposit, config);
  ctx.log(`Withdrawal of ${deposit.amount.toString()} from deposit ${deposit.id.toString()}`);
}
