/**
 * @chronovault/vault — Instruction dispatcher.
 *
 * Decodes the request and hands it to exactly one handler. Has no side
 * effects of its own; the handler's outcome is returned (or thrown)
 * unchanged.
 */

import { LEDGER_PROGRAM_ID } from "@chronovault/ledger";
import type { AccountInfo, InvokeContext, Program } from "@chronovault/runtime";
import type { Address } from "@chronovault/types";
import { processCreate } from "./handlers/create.js";
import { processDeposit } from "./handlers/deposit.js";
import { processEmergencyWithdraw } from "./handlers/emergency-withdraw.js";
import { processWithdraw } from "./handlers/withdraw.js";
import { decodeVaultInstruction } from "./instruction.js";
import { VAULT_PROGRAM_ID } from "./types.js";
import type { VaultProgramConfig } from "./types.js";

export const DEFAULT_VAULT_CONFIG: VaultProgramConfig = {
  ledgerProgramId: LEDGER_PROGRAM_ID,
};

export function processInstruction(
  ctx: InvokeContext,
  accounts: readonly AccountInfo[],
  data: Uint8Array,
  config: VaultProgramConfig = DEFAULT_VAULT_CONFIG,
): void {
  const instruction = decodeVaultInstruction(data);
  switch (instruction.kind) {
    case "create":
      processCreate(ctx, accounts);
      return;
    case "deposit":
      processDeposit(ctx, accounts, instruction, config);
      return;
    case "withdraw":
      processWithdraw(ctx, accounts, instruction.depositId, config);
      return;
    case "emergencyWithdraw":
      processEmergencyWithdraw(ctx, accounts, instruction.depositId, config);
      return;
  }
}

export interface VaultProgramOptions {
  readonly programId?: Address;
  readonly ledgerProgramId?: Address;
}

/**
 * The vault as a runtime program.
 */
export class VaultProgram implements Program {
  readonly programId: Address;
  private readonly _config: VaultProgramConfig;

  constructor(options: VaultProgramOptions = {}) {
    this.programId = options.programId ?? VAULT_PROGRAM_ID;
    this._config = { ledgerProgramId: options.ledgerProgramId ?? LEDGER_PROGRAM_ID };
  }

  process(ctx: InvokeContext, accounts: readonly AccountInfo[], data: Uint8Array): void {
    processInstruction(ctx, accounts, data, this._config);
  }
}
