/**
 * @chronovault/vault — Persisted vault layout.
 *
 *   Vault:   owner (32) | deposit_count u64 | u32 len + Deposit* | guard u8 | option u8 [+ authority (32)]
 *   Deposit: id u64 | depositor (32) | token_mint (32) | amount u64 | unlock_time i64
 *            | withdrawn u8 | tag (32) | created_at i64
 *
 * The vault is decoded, changed and re-encoded on every operation, so
 * decode(encode(v)) must equal v and decoding must consume every byte.
 */

import { BinaryReader, BinaryWriter } from "@chronovault/runtime";
import type { Address } from "@chronovault/types";
import { TAG_LENGTH } from "./types.js";
import type { Deposit, Vault } from "./types.js";

// =============================================================================
// Encode
// =============================================================================

function writeDeposit(writer: BinaryWriter, deposit: Deposit): void {
  writer
    .u64(deposit.id)
    .address(deposit.depositor)
    .address(deposit.tokenMint)
    .u64(deposit.amount)
    .i64(deposit.unlockTime)
    .bool(deposit.withdrawn)
    .fixedBytes(deposit.tag, TAG_LENGTH)
    .i64(deposit.createdAt);
}

export function encodeVault(vault: Vault): Uint8Array {
  const writer = new BinaryWriter()
    .address(vault.owner)
    .u64(vault.depositCount)
    .u32(vault.deposits.length);

  for (const deposit of vault.deposits) {
    writeDeposit(writer, deposit);
  }

  writer.bool(vault.reentrancyGuard);
  if (vault.emergencyAuthority === null) {
    writer.u8(0);
  } else {
    writer.u8(1).address(vault.emergencyAuthority);
  }

  return writer.toBytes();
}

// =============================================================================
// Decode
// =============================================================================

function readDeposit(reader: BinaryReader): Deposit {
  return {
    id: reader.u64(),
    depositor: reader.address(),
    tokenMint: reader.address(),
    amount: reader.u64(),
    unlockTime: reader.i64(),
    withdrawn: reader.bool(),
    tag: reader.fixedBytes(TAG_LENGTH),
    createdAt: reader.i64(),
  };
}

/**
 * Decode a vault record. Malformed bytes fail with host
 * INVALID_ACCOUNT_DATA.
 */
export function decodeVault(data: Uint8Array): Vault {
  const reader = new BinaryReader(data);

  const owner = reader.address();
  const depositCount = reader.u64();
  const length = reader.u32();
  const deposits: Deposit[] = [];
  for (let i = 0; i < length; i++) {
    deposits.push(readDeposit(reader));
  }
  const reentrancyGuard = reader.bool();
  const emergencyAuthority = reader.bool() ? reader.address() : null;

  reader.finish();
  return { owner, depositCount, deposits, reentrancyGuard, emergencyAuthority };
}

/** Alias of decodeVault for clients reading raw account bytes. */
export const loadVault = decodeVault;

// =============================================================================
// Queries
// =============================================================================

/** A fresh vault owned by `owner`. */
export function newVault(owner: Address): Vault {
  return {
    owner,
    depositCount: 0n,
    deposits: [],
    reentrancyGuard: false,
    emergencyAuthority: null,
  };
}

export function findDeposit(vault: Vault, id: bigint): Deposit | undefined {
  return vault.deposits.find((d) => d.id === id);
}
