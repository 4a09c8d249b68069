/**
 * @chronovault/runtime — Per-invocation context handed to programs.
 *
 * Gives a running program the few host services it may use: logging,
 * the time source (through the clock sysvar), and nested invocation of
 * other programs, optionally signing for its own derived addresses.
 */

import type { Address, Instruction, Timestamp } from "@chronovault/types";
import type { AccountInfo } from "./account-info.js";
import type { StagedAccounts } from "./account-store.js";
import { deriveAddress } from "./address.js";
import { CLOCK_SYSVAR_ID } from "./clock.js";
import type { TimeSource } from "./clock.js";
import { RuntimeError } from "./errors.js";
import type { ProgramLog } from "./types.js";

/**
 * Privileges an invocation may pass on to the instructions it issues.
 */
export interface CallerPrivileges {
  readonly signers: ReadonlySet<Address>;
  readonly writable: ReadonlySet<Address>;
}

/**
 * State shared by every invocation in one transaction.
 */
export interface TransactionFrame {
  readonly staged: StagedAccounts;
  readonly logs: ProgramLog[];
  /** Every error thrown by an invocation, innermost first. Non-empty aborts the transaction. */
  readonly failures: unknown[];
}

/**
 * What the context needs from the runtime. Implemented by Runtime.
 */
export interface InvocationHost {
  readonly timeSource: TimeSource;
  dispatch(
    instruction: Instruction,
    caller: CallerPrivileges,
    depth: number,
    frame: TransactionFrame,
  ): void;
}

export class InvokeContext {
  readonly programId: Address;
  readonly depth: number;
  private readonly _host: InvocationHost;
  private readonly _privileges: CallerPrivileges;
  private readonly _frame: TransactionFrame;

  constructor(
    host: InvocationHost,
    programId: Address,
    depth: number,
    privileges: CallerPrivileges,
    frame: TransactionFrame,
  ) {
    this._host = host;
    this.programId = programId;
    this.depth = depth;
    this._privileges = privileges;
    this._frame = frame;
  }

  log(message: string): void {
    this._frame.logs.push({ programId: this.programId, depth: this.depth, message });
  }

  /**
   * Current time, read through the clock sysvar account.
   */
  now(clock: AccountInfo): Timestamp {
    if (clock.address !== CLOCK_SYSVAR_ID) {
      throw new RuntimeError(
        "INVALID_ARGUMENT",
        `Expected clock sysvar ${CLOCK_SYSVAR_ID}, got ${clock.address}`,
      );
    }
    return this._host.timeSource.now();
  }

  /**
   * Invoke another program synchronously.
   *
   * Signer privilege extends to accounts that signed this invocation and
   * to every address derived from this program's id with one of
   * `signerSeeds`.
   */
  invoke(
    instruction: Instruction,
    signerSeeds: readonly (readonly Uint8Array[])[] = [],
  ): void {
    const signers = new Set(this._privileges.signers);
    for (const seeds of signerSeeds) {
      signers.add(deriveAddress(this.programId, seeds));
    }

    this._host.dispatch(
      instruction,
      { signers, writable: this._privileges.writable },
      this.depth + 1,
      this._frame,
    );
  }
}
