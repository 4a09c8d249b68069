/**
 * @chronovault/ledger — Token ledger program.
 *
 * The balance-holding collaborator of the vault, run as a program on the
 * host runtime:
 * - Token accounts (mint, owner, amount)
 * - InitializeAccount, MintTo, Transfer
 * - Checked u64 arithmetic and display helpers
 * - Per-mint transfer hooks
 */

// Program
export { LedgerProgram } from "./ledger-program.js";
export type { LedgerProgramOptions } from "./ledger-program.js";

// Token accounts
export {
  encodeTokenAccount,
  decodeTokenAccount,
  readTokenAccount,
} from "./token-account.js";

// Instructions
export {
  encodeLedgerInstruction,
  decodeLedgerInstruction,
  initializeAccountInstruction,
  mintToInstruction,
  transferInstruction,
} from "./instructions.js";
export type { TransferParams } from "./instructions.js";

// Arithmetic
export {
  assertU64,
  checkedAddU64,
  checkedSubU64,
  parseAmount,
  formatAmount,
} from "./u64-math.js";

// Types
export {
  LedgerError,
  LEDGER_PROGRAM_ID,
  LEDGER_INSTRUCTION_TAG,
  TOKEN_ACCOUNT_SIZE,
} from "./types.js";
export type { LedgerErrorCode, LedgerInstruction } from "./types.js";
