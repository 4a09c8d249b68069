/**
 * Deposit: lock tokens in vault custody until `unlockTime`.
 *
 * Accounts: [depositor (signer), vault (writable), source (writable),
 *            destination (writable), ledger program, clock, ...forwarded]
 *
 * `destination` must be a token account owned by the vault's derived
 * authority. The deposit's mint is taken from the source account, not
 * from the request.
 */

import { RuntimeError } from "@chronovault/runtime";
import type { AccountInfo, InvokeContext } from "@chronovault/runtime";
import { readTokenAccount, transferInstruction } from "@chronovault/ledger";
import { U64_MAX } from "@chronovault/types";
import type { Timestamp } from "@chronovault/types";
import {
  requireOwnedBy,
  requireProgram,
  requireSigner,
  vaultAuthority,
} from "../authorization.js";
import { VaultError } from "../errors.js";
import { acquireGuard, releaseGuard } from "../guard.js";
import { decodeVault } from "../state.js";
import type { Deposit, Vault, VaultProgramConfig } from "../types.js";
import { forwardedAccounts } from "./release.js";

export interface DepositArgs {
  readonly amount: bigint;
  readonly unlockTime: Timestamp;
  readonly tag: Uint8Array;
}

export function processDeposit(
  ctx: InvokeContext,
  accounts: readonly AccountInfo[],
  args: DepositArgs,
  config: VaultProgramConfig,
): void {
  const [depositor, vaultAccount, source, destination, ledgerProgram, clock, ...remaining] =
    accounts;
  if (
    depositor === undefined ||
    vaultAccount === undefined ||
    source === undefined ||
    destination === undefined ||
    ledgerProgram === undefined ||
    clock === undefined
  ) {
    throw new RuntimeError(
      "NOT_ENOUGH_ACCOUNT_KEYS",
      "Deposit needs [depositor, vault, source, destination, ledger, clock]",
    );
  }

  requireSigner(depositor, "Depositor");
  requireOwnedBy(vaultAccount, ctx.programId);
  requireProgram(ledgerProgram, config.ledgerProgramId);

  const guarded = acquireGuard(vaultAccount, decodeVault(vaultAccount.data));

  if (args.amount === 0n) {
    throw new VaultError("INVALID_AMOUNT", "Deposit amount must be greater than zero");
  }

  const now = ctx.now(clock);
  if (args.unlockTime <= now) {
    throw new VaultError(
      "INVALID_UNLOCK_TIME",
      `Unlock time ${args.unlockTime.toString()} is not after ${now.toString()}`,
    );
  }

  const funding = readTokenAccount(source, config.ledgerProgramId);
  if (funding.amount < args.amount) {
    throw new VaultError(
      "INSUFFICIENT_FUNDS",
      `Source holds ${funding.amount.toString()}, deposit needs ${args.amount.toString()}`,
    );
  }

  const custody = readTokenAccount(destination, config.ledgerProgramId);
  const authority = vaultAuthority(ctx.programId, vaultAccount.address);
  if (custody.owner !== authority) {
    throw new RuntimeError(
      "INVALID_ACCOUNT_OWNER",
      `Destination ${destination.address} is not held by the vault authority ${authority}`,
    );
  }

  const deposit: Deposit = {
    id: guarded.depositCount,
    depositor: depositor.address,
    tokenMint: funding.mint,
    amount: args.amount,
    unlockTime: args.unlockTime,
    withdrawn: false,
    tag: args.tag,
    createdAt: now,
  };

  const depositCount = guarded.depositCount + 1n;
  if (depositCount > U64_MAX) {
    throw new VaultError("MATH_OVERFLOW", "Deposit counter would overflow");
  }

  const updated: Vault = {
    ...guarded,
    depositCount,
    deposits: [...guarded.deposits, deposit],
  };

  ctx.invoke(
    transferInstruction({
      source: source.address,
      destination: destination.address,
      authority: depositor.address,
      amount: args.amount,
      extraAccounts: forwardedAccounts(remaining),
      programId: config.ledgerProgramId,
    }),
  );

  releaseGuard(vaultAccount, updated);
  ctx.log(
    `Deposit ${deposit.id.toString()}: ${deposit.amount.toString()} locked until ${deposit.unlockTime.toString()}`,
  );
}
