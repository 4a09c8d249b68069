/**
 * @chronovault/vault — Instruction builders.
 *
 * Lay out each operation's positional accounts with the privileges the
 * handlers expect. Role order is part of the contract.
 */

import { LEDGER_PROGRAM_ID } from "@chronovault/ledger";
import { CLOCK_SYSVAR_ID } from "@chronovault/runtime";
import type { AccountMeta, Address, Instruction, Timestamp } from "@chronovault/types";
import { encodeVaultInstruction } from "./instruction.js";
import { VAULT_PROGRAM_ID } from "./types.js";

interface RoutingParams {
  readonly programId?: Address;
  readonly ledgerProgramId?: Address;
  /** Forwarded to the ledger transfer, e.g. for a mint's transfer hook */
  readonly remainingAccounts?: readonly AccountMeta[];
}

const signer = (address: Address): AccountMeta => ({ address, isSigner: true, isWritable: false });
const writable = (address: Address): AccountMeta => ({ address, isSigner: false, isWritable: true });
const readOnly = (address: Address): AccountMeta => ({ address, isSigner: false, isWritable: false });

export interface CreateVaultParams {
  readonly owner: Address;
  readonly vault: Address;
  readonly programId?: Address;
}

export function createVaultInstruction(params: CreateVaultParams): Instruction {
  return {
    programId: params.programId ?? VAULT_PROGRAM_ID,
    accounts: [signer(params.owner), writable(params.vault)],
    data: encodeVaultInstruction({ kind: "create" }),
  };
}

export interface DepositParams extends RoutingParams {
  readonly depositor: Address;
  readonly vault: Address;
  /** Depositor's token account */
  readonly source: Address;
  /** Vault custody token account */
  readonly destination: Address;
  readonly amount: bigint;
  readonly unlockTime: Timestamp;
  readonly tag: Uint8Array;
}

export function depositInstruction(params: DepositParams): Instruction {
  return {
    programId: params.programId ?? VAULT_PROGRAM_ID,
    accounts: [
      signer(params.depositor),
      writable(params.vault),
      writable(params.source),
      writable(params.destination),
      readOnly(params.ledgerProgramId ?? LEDGER_PROGRAM_ID),
      readOnly(CLOCK_SYSVAR_ID),
      ...(params.remainingAccounts ?? []),
    ],
    data: encodeVaultInstruction({
      kind: "deposit",
      amount: params.amount,
      unlockTime: params.unlockTime,
      tag: params.tag,
    }),
  };
}

export interface WithdrawParams extends RoutingParams {
  readonly depositor: Address;
  readonly vault: Address;
  /** Depositor's token account */
  readonly destination: Address;
  /** Vault custody token account */
  readonly source: Address;
  readonly depositId: bigint;
}

export function withdrawInstruction(params: WithdrawParams): Instruction {
  return {
    programId: params.programId ?? VAULT_PROGRAM_ID,
    accounts: [
      signer(params.depositor),
      writable(params.vault),
      writable(params.destination),
      writable(params.source),
      readOnly(params.ledgerProgramId ?? LEDGER_PROGRAM_ID),
      readOnly(CLOCK_SYSVAR_ID),
      ...(params.remainingAccounts ?? []),
    ],
    data: encodeVaultInstruction({ kind: "withdraw", depositId: params.depositId }),
  };
}

export interface EmergencyWithdrawParams extends RoutingParams {
  readonly authority: Address;
  readonly vault: Address;
  /** Depositor's token account */
  readonly destination: Address;
  /** Vault custody token account */
  readonly source: Address;
  readonly depositor: Address;
  readonly depositId: bigint;
}

export function emergencyWithdrawInstruction(params: EmergencyWithdrawParams): Instruction {
  return {
    programId: params.programId ?? VAULT_PROGRAM_ID,
    accounts: [
      signer(params.authority),
      writable(params.vault),
      writable(params.destination),
      writable(params.source),
      readOnly(params.ledgerProgramId ?? LEDGER_PROGRAM_ID),
      readOnly(params.depositor),
      ...(params.remainingAccounts ?? []),
    ],
    data: encodeVaultInstruction({ kind: "emergencyWithdraw", depositId: params.depositId }),
  };
}
