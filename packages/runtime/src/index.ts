/**
 * @chronovault/runtime — Transaction-processing host.
 *
 * Supplies everything the vault treats as external:
 * - Account storage with staged, all-or-nothing commits
 * - Signature verification and privilege propagation
 * - Nested invocation with program-derived signers
 * - The time source (clock sysvar)
 * - Configuration and structured logging
 *
 * Design rules:
 * - Programs run synchronously to completion
 * - A thrown error leaves committed state untouched
 * - Writes are visible to nested calls immediately, durable only on commit
 */

// Host
export { Runtime, DEFAULT_MAX_INVOKE_DEPTH } from "./runtime.js";
export type { RuntimeOptions } from "./runtime.js";
export { InvokeContext } from "./invoke-context.js";
export type {
  CallerPrivileges,
  TransactionFrame,
  InvocationHost,
} from "./invoke-context.js";
export { AccountInfo } from "./account-info.js";
export { AccountStore, StagedAccounts } from "./account-store.js";
export type { AccountRecord } from "./account-store.js";

// Addresses
export {
  addressToBytes,
  addressFromBytes,
  addressFromLabel,
  deriveAddress,
  SYSTEM_PROGRAM_ID,
  MAX_SEED_LENGTH,
  MAX_SEEDS,
} from "./address.js";

// Binary codec
export { BinaryReader, BinaryWriter } from "./codec.js";
export type { DecodeErrorFactory } from "./codec.js";

// Time
export { CLOCK_SYSVAR_ID, SystemClock, ManualClock } from "./clock.js";
export type { TimeSource } from "./clock.js";

// Errors
export { RuntimeError, errorCodeOf } from "./errors.js";
export type { RuntimeErrorCode } from "./errors.js";

// Config + logging
export { ConfigSchema, loadConfig } from "./config.js";
export type { RuntimeConfig } from "./config.js";
export { createLogger } from "./logger.js";

// Types
export type { Program, ProgramLog, TransactionReceipt } from "./types.js";
