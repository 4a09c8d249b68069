/**
 * @chronovault/runtime — Account storage with staged commits.
 *
 * The store holds the committed (durable) state. Every transaction works
 * on a StagedAccounts copy; writes land in the copy immediately, so
 * nested invocations see them, but nothing reaches the store until
 * commit(). A failed transaction simply drops its copy.
 *
 * Rules:
 * - Records are immutable; data buffers are copied on the way in and out
 * - commit() swaps the whole map in one step
 * - A staged copy can be committed at most once
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Address } from "@chronovault/types";
import { RuntimeError } from "./errors.js";

/**
 * A single storage slot: the program that owns it and its raw bytes.
 */
export interface AccountRecord {
  readonly owner: Address;
  readonly data: Uint8Array;
}

function copyRecord(record: AccountRecord): AccountRecord {
  return { owner: record.owner, data: Uint8Array.from(record.data) };
}

// =============================================================================
// Staged working copy
// =============================================================================

/**
 * The working copy of all accounts for one in-flight transaction.
 */
export class StagedAccounts {
  private readonly _records: Map<Address, AccountRecord>;
  private _sealed = false;

  constructor(base: ReadonlyMap<Address, AccountRecord>) {
    this._records = new Map(base);
  }

  get(address: Address): AccountRecord | undefined {
    const record = this._records.get(address);
    return record === undefined ? undefined : copyRecord(record);
  }

  put(address: Address, record: AccountRecord): void {
    if (this._sealed) {
      throw new RuntimeError(
        "INVALID_ARGUMENT",
        "Cannot write to a staged copy that has already been committed",
      );
    }
    this._records.set(address, copyRecord(record));
  }

  /** @internal Hand the records to the store and refuse further writes. */
  seal(): ReadonlyMap<Address, AccountRecord> {
    if (this._sealed) {
      throw new RuntimeError("INVALID_ARGUMENT", "Staged copy already committed");
    }
    this._sealed = true;
    return this._records;
  }
}

// =============================================================================
// Committed store
// =============================================================================

/**
 * Durable account state.
 */
export class AccountStore {
  private _committed: ReadonlyMap<Address, AccountRecord> = new Map();

  get(address: Address): AccountRecord | undefined {
    const record = this._committed.get(address);
    return record === undefined ? undefined : copyRecord(record);
  }

  has(address: Address): boolean {
    return this._committed.has(address);
  }

  /**
   * Write a record directly to committed state.
   * Reserved for genesis and out-of-band provisioning.
   */
  set(address: Address, record: AccountRecord): void {
    const next = new Map(this._committed);
    next.set(address, copyRecord(record));
    this._committed = next;
  }

  /**
   * Open a working copy for a new transaction.
   */
  begin(): StagedAccounts {
    return new StagedAccounts(this._committed);
  }

  /**
   * Atomically replace committed state with a working copy.
   */
  commit(staged: StagedAccounts): void {
    this._committed = staged.seal();
  }

  get size(): number {
    return this._committed.size;
  }

  /**
   * SHA-256 over the RFC 8785 canonical form of every committed account.
   * Two stores with byte-identical contents hash identically.
   */
  stateHash(): string {
    const accounts = [...this._committed.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([address, record]) => ({
        address,
        owner: record.owner,
        data: Buffer.from(record.data).toString("hex"),
      }));

    return createHash("sha256").update(canonicalize(accounts)).digest("hex");
  }
}
