/**
 * Shared steps of the handlers that move funds.
 */

import { RuntimeError } from "@chronovault/runtime";
import type { AccountInfo, InvokeContext } from "@chronovault/runtime";
import { readTokenAccount, transferInstruction } from "@chronovault/ledger";
import type { AccountMeta } from "@chronovault/types";
import { vaultAuthority, vaultAuthoritySeeds } from "../authorization.js";
import { VaultError } from "../errors.js";
import { encodeVault, findDeposit } from "../state.js";
import { releaseGuard } from "../guard.js";
import type { Deposit, Vault, VaultProgramConfig } from "../types.js";

/**
 * Re-express accounts the caller passed beyond an instruction's
 * positional list, keeping the privileges they arrived with.
 */
export function forwardedAccounts(accounts: readonly AccountInfo[]): AccountMeta[] {
  return accounts.map((a) => ({
    address: a.address,
    isSigner: a.isSigner,
    isWritable: a.isWritable,
  }));
}

export function requireDeposit(vault: Vault, id: bigint): Deposit {
  const deposit = findDeposit(vault, id);
  if (deposit === undefined) {
    throw new VaultError("DEPOSIT_NOT_FOUND", `No deposit with id ${id.toString()}`);
  }
  return deposit;
}

export function requireNotWithdrawn(deposit: Deposit): void {
  if (deposit.withdrawn) {
    throw new VaultError(
      "ALREADY_WITHDRAWN",
      `Deposit ${deposit.id.toString()} was already withdrawn`,
    );
  }
}

export interface ReleaseAccounts {
  readonly vault: AccountInfo;
  readonly destination: AccountInfo;
  readonly source: AccountInfo;
  readonly remaining: readonly AccountInfo[];
}

/**
 * Mark `deposit` withdrawn and pay its amount out of vault custody,
 * signing as the vault's derived authority. Expects the guard held;
 * releases it once the transfer returns.
 */
export function releaseDeposit(
  ctx: InvokeContext,
  accounts: ReleaseAccounts,
  vault: Vault,
  deposit: Deposit,
  config: VaultProgramConfig,
): void {
  const custody = readTokenAccount(accounts.source, config.ledgerProgramId);
  if (custody.mint !== deposit.tokenMint) {
    throw new RuntimeError(
      "INVALID_ARGUMENT",
      `Source holds mint ${custody.mint}; deposit ${deposit.id.toString()} is ${deposit.tokenMint}`,
    );
  }

  const settled: Vault = {
    ...vault,
    deposits: vault.deposits.map((d) => (d.id === deposit.id ? { ...d, withdrawn: true } : d)),
  };
  accounts.vault.setData(encodeVault(settled));

  ctx.invoke(
    transferInstruction({
      source: accounts.source.address,
      destination: accounts.destination.address,
      authority: vaultAuthority(ctx.programId, accounts.vault.address),
      amount: deposit.amount,
      extraAccounts: forwardedAccounts(accounts.remaining),
      programId: config.ledgerProgramId,
    }),
    [vaultAuthoritySeeds(accounts.vault.address)],
  );

  releaseGuard(accounts.vault, settled);
}
