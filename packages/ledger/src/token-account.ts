/**
 * @chronovault/ledger — Token account layout.
 *
 *   mint (32) | owner (32) | amount (u64 LE)
 */

import { BinaryReader, BinaryWriter, RuntimeError } from "@chronovault/runtime";
import type { AccountInfo } from "@chronovault/runtime";
import type { Address, TokenAccount } from "@chronovault/types";
import { LEDGER_PROGRAM_ID, LedgerError, TOKEN_ACCOUNT_SIZE } from "./types.js";

export function encodeTokenAccount(account: TokenAccount): Uint8Array {
  return new BinaryWriter()
    .address(account.mint)
    .address(account.owner)
    .u64(account.amount)
    .toBytes();
}

export function decodeTokenAccount(data: Uint8Array): TokenAccount {
  if (data.length !== TOKEN_ACCOUNT_SIZE) {
    throw new RuntimeError(
      "INVALID_ACCOUNT_DATA",
      `Token account must be ${String(TOKEN_ACCOUNT_SIZE)} bytes, got ${String(data.length)}`,
    );
  }
  const reader = new BinaryReader(data);
  const account: TokenAccount = {
    mint: reader.address(),
    owner: reader.address(),
    amount: reader.u64(),
  };
  reader.finish();
  return account;
}

/**
 * Read a token account through the runtime, checking it is ledger storage
 * and has been initialized.
 */
export function readTokenAccount(
  info: AccountInfo,
  ledgerProgramId: Address = LEDGER_PROGRAM_ID,
): TokenAccount {
  if (info.owner !== ledgerProgramId) {
    throw new RuntimeError(
      "INVALID_ACCOUNT_OWNER",
      `Account ${info.address} is not a token account (owner ${info.owner})`,
    );
  }
  if (info.isEmpty) {
    throw new LedgerError(
      "UNINITIALIZED_ACCOUNT",
      `Token account ${info.address} is not initialized`,
    );
  }
  return decodeTokenAccount(info.data);
}
