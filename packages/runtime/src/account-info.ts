/**
 * @chronovault/runtime — Live account view handed to programs.
 *
 * An AccountInfo reads through to the transaction's staged copy, so it
 * always reflects the latest write in this transaction, including writes
 * made by nested invocations.
 */

import type { Address } from "@chronovault/types";
import type { StagedAccounts } from "./account-store.js";
import { SYSTEM_PROGRAM_ID } from "./address.js";
import { RuntimeError } from "./errors.js";

export class AccountInfo {
  readonly address: Address;
  readonly isSigner: boolean;
  readonly isWritable: boolean;
  private readonly _staged: StagedAccounts;
  private readonly _executingProgram: Address;

  constructor(
    address: Address,
    isSigner: boolean,
    isWritable: boolean,
    staged: StagedAccounts,
    executingProgram: Address,
  ) {
    this.address = address;
    this.isSigner = isSigner;
    this.isWritable = isWritable;
    this._staged = staged;
    this._executingProgram = executingProgram;
  }

  /** Program that owns this account; the system program if unallocated. */
  get owner(): Address {
    return this._staged.get(this.address)?.owner ?? SYSTEM_PROGRAM_ID;
  }

  /** A copy of the account's current bytes. */
  get data(): Uint8Array {
    return this._staged.get(this.address)?.data ?? new Uint8Array(0);
  }

  get isEmpty(): boolean {
    return this.data.length === 0;
  }

  /**
   * Replace the account's bytes in the staged copy.
   * Only the owning program may write, and only through a writable reference.
   */
  setData(data: Uint8Array): void {
    if (!this.isWritable) {
      throw new RuntimeError(
        "READONLY_DATA_MODIFIED",
        `Account ${this.address} was not passed as writable`,
      );
    }
    const owner = this.owner;
    if (owner !== this._executingProgram) {
      throw new RuntimeError(
        "EXTERNAL_ACCOUNT_DATA_MODIFIED",
        `Program ${this._executingProgram} cannot write account ${this.address} owned by ${owner}`,
      );
    }
    this._staged.put(this.address, { owner, data });
  }
}
