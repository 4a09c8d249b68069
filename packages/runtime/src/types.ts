/**
 * @chronovault/runtime — Program contract and transaction results.
 */

import type { Address } from "@chronovault/types";
import type { AccountInfo } from "./account-info.js";
import type { InvokeContext } from "./invoke-context.js";

/**
 * A program the runtime can dispatch instructions to.
 *
 * `process` runs synchronously to completion. Throwing aborts the whole
 * transaction; returning normally is success.
 */
export interface Program {
  readonly programId: Address;
  process(
    ctx: InvokeContext,
    accounts: readonly AccountInfo[],
    data: Uint8Array,
  ): void;
}

/**
 * One line of program output, tagged with who wrote it and how deep in
 * the invocation stack it was.
 */
export interface ProgramLog {
  readonly programId: Address;
  readonly depth: number;
  readonly message: string;
}

/**
 * Result of a committed transaction.
 */
export interface TransactionReceipt {
  readonly instructionCount: number;
  readonly logs: readonly ProgramLog[];
  /** Committed state hash after this transaction */
  readonly stateHash: string;
}
