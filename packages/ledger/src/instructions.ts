/**
 * @chronovault/ledger — Instruction codec and builders.
 *
 * Wire format: u8 tag, then the variant's fields little-endian.
 *
 *   0 InitializeAccount  mint (32) | owner (32)
 *   1 MintTo             amount u64
 *   2 Transfer           amount u64
 */

import { BinaryReader, BinaryWriter } from "@chronovault/runtime";
import type { AccountMeta, Address, Instruction } from "@chronovault/types";
import {
  LEDGER_INSTRUCTION_TAG,
  LEDGER_PROGRAM_ID,
  LedgerError,
} from "./types.js";
import type { LedgerInstruction } from "./types.js";

// =============================================================================
// Codec
// =============================================================================

export function encodeLedgerInstruction(instruction: LedgerInstruction): Uint8Array {
  const writer = new BinaryWriter().u8(LEDGER_INSTRUCTION_TAG[instruction.kind]);
  switch (instruction.kind) {
    case "initializeAccount":
      writer.address(instruction.mint).address(instruction.owner);
      break;
    case "mintTo":
    case "transfer":
      writer.u64(instruction.amount);
      break;
  }
  return writer.toBytes();
}

export function decodeLedgerInstruction(data: Uint8Array): LedgerInstruction {
  const reader = new BinaryReader(
    data,
    (message) => new LedgerError("INVALID_INSTRUCTION", message),
  );

  let instruction: LedgerInstruction;
  const tag = reader.u8();
  switch (tag) {
    case LEDGER_INSTRUCTION_TAG.initializeAccount:
      instruction = { kind: "initializeAccount", mint: reader.address(), owner: reader.address() };
      break;
    case LEDGER_INSTRUCTION_TAG.mintTo:
      instruction = { kind: "mintTo", amount: reader.u64() };
      break;
    case LEDGER_INSTRUCTION_TAG.transfer:
      instruction = { kind: "transfer", amount: reader.u64() };
      break;
    default:
      throw new LedgerError("INVALID_INSTRUCTION", `Unknown ledger instruction tag ${String(tag)}`);
  }

  reader.finish();
  return instruction;
}

// =============================================================================
// Builders
// =============================================================================

export function initializeAccountInstruction(
  account: Address,
  mint: Address,
  owner: Address,
  programId: Address = LEDGER_PROGRAM_ID,
): Instruction {
  return {
    programId,
    accounts: [{ address: account, isSigner: false, isWritable: true }],
    data: encodeLedgerInstruction({ kind: "initializeAccount", mint, owner }),
  };
}

export function mintToInstruction(
  account: Address,
  mint: Address,
  amount: bigint,
  programId: Address = LEDGER_PROGRAM_ID,
): Instruction {
  return {
    programId,
    accounts: [
      { address: account, isSigner: false, isWritable: true },
      { address: mint, isSigner: true, isWritable: false },
    ],
    data: encodeLedgerInstruction({ kind: "mintTo", amount }),
  };
}

export interface TransferParams {
  readonly source: Address;
  readonly destination: Address;
  readonly authority: Address;
  readonly amount: bigint;
  /** Passed through to the mint's transfer hook, if any. */
  readonly extraAccounts?: readonly AccountMeta[];
  readonly programId?: Address;
}

export function transferInstruction(params: TransferParams): Instruction {
  return {
    programId: params.programId ?? LEDGER_PROGRAM_ID,
    accounts: [
      { address: params.source, isSigner: false, isWritable: true },
      { address: params.destination, isSigner: false, isWritable: true },
      { address: params.authority, isSigner: true, isWritable: false },
      ...(params.extraAccounts ?? []),
    ],
    data: encodeLedgerInstruction({ kind: "transfer", amount: params.amount }),
  };
}
