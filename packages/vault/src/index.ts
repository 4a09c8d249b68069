/**
 * @chronovault/vault — Time-locked custody vault.
 *
 * A program for the host runtime that holds token deposits until their
 * unlock time:
 * - Create, Deposit, Withdraw, EmergencyWithdraw
 * - Reentrancy guard held across every outgoing transfer
 * - Funds leave custody only under the vault's derived authority
 * - Stable error codes for every rejection
 */

// Program
export { VaultProgram, processInstruction, DEFAULT_VAULT_CONFIG } from "./processor.js";
export type { VaultProgramOptions } from "./processor.js";

// Handlers
export { processCreate } from "./handlers/create.js";
export { processDeposit } from "./handlers/deposit.js";
export type { DepositArgs } from "./handlers/deposit.js";
export { processWithdraw } from "./handlers/withdraw.js";
export { processEmergencyWithdraw } from "./handlers/emergency-withdraw.js";

// State
export { encodeVault, decodeVault, loadVault, newVault, findDeposit } from "./state.js";
export { acquireGuard, releaseGuard } from "./guard.js";

// Authorization
export {
  requireSigner,
  requireOwnedBy,
  requireProgram,
  isDepositor,
  isEmergencyAuthority,
  requireDepositor,
  requireEmergencyAuthority,
  vaultAuthority,
  vaultAuthoritySeeds,
  VAULT_AUTHORITY_SEED,
} from "./authorization.js";

// Instructions
export { encodeVaultInstruction, decodeVaultInstruction } from "./instruction.js";
export {
  createVaultInstruction,
  depositInstruction,
  withdrawInstruction,
  emergencyWithdrawInstruction,
} from "./builders.js";
export type {
  CreateVaultParams,
  DepositParams,
  WithdrawParams,
  EmergencyWithdrawParams,
} from "./builders.js";
export { tagFromString, tagToString } from "./tag.js";

// Errors
export { VaultError, VAULT_ERROR_NUMBERS, vaultErrorCodeOf } from "./errors.js";
export type { VaultErrorCode } from "./errors.js";

// Types
export { VAULT_PROGRAM_ID, TAG_LENGTH, VAULT_INSTRUCTION_TAG } from "./types.js";
export type {
  Deposit,
  Vault,
  VaultInstruction,
  VaultProgramConfig,
} from "./types.js";
