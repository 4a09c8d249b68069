/**
 * @chronovault/vault — Instruction codec.
 *
 *   0 Create
 *   1 Deposit            amount u64 | unlock_time i64 | tag (32)
 *   2 Withdraw           deposit_id u64
 *   3 EmergencyWithdraw  deposit_id u64
 *
 * Empty input, an unknown variant, or short or trailing bytes fail
 * with INVALID_INSTRUCTION_DATA.
 */

import { BinaryReader, BinaryWriter } from "@chronovault/runtime";
import { VaultError } from "./errors.js";
import { TAG_LENGTH, VAULT_INSTRUCTION_TAG } from "./types.js";
import type { VaultInstruction } from "./types.js";

export function encodeVaultInstruction(instruction: VaultInstruction): Uint8Array {
  const writer = new BinaryWriter().u8(VAULT_INSTRUCTION_TAG[instruction.kind]);
  switch (instruction.kind) {
    case "create":
      break;
    case "deposit":
      writer
        .u64(instruction.amount)
        .i64(instruction.unlockTime)
        .fixedBytes(instruction.tag, TAG_LENGTH);
      break;
    case "withdraw":
    case "emergencyWithdraw":
      writer.u64(instruction.depositId);
      break;
  }
  return writer.toBytes();
}

export function decodeVaultInstruction(data: Uint8Array): VaultInstruction {
  const reader = new BinaryReader(
    data,
    (message) => new VaultError("INVALID_INSTRUCTION_DATA", message),
  );

  let instruction: VaultInstruction;
  const variant = reader.u8();
  switch (variant) {
    case VAULT_INSTRUCTION_TAG.create:
      instruction = { kind: "create" };
      break;
    case VAULT_INSTRUCTION_TAG.deposit:
      instruction = {
        kind: "deposit",
        amount: reader.u64(),
        unlockTime: reader.i64(),
        tag: reader.fixedBytes(TAG_LENGTH),
      };
      break;
    case VAULT_INSTRUCTION_TAG.withdraw:
      instruction = { kind: "withdraw", depositId: reader.u64() };
      break;
    case VAULT_INSTRUCTION_TAG.emergencyWithdraw:
      instruction = { kind: "emergencyWithdraw", depositId: reader.u64() };
      break;
    default:
      throw new VaultError(
        "INVALID_INSTRUCTION_DATA",
        `Unknown instruction variant ${String(variant)}`,
      );
  }

  reader.finish();
  return instruction;
}
