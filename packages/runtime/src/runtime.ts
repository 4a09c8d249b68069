/**
 * @chronovault/runtime — Transaction processing host.
 *
 * Runs transactions against registered programs with all-or-nothing
 * semantics:
 *
 *   begin working copy → dispatch each instruction → commit
 *
 * Any thrown error discards the working copy and is rethrown unchanged,
 * so committed state is byte-for-byte what it was before the call.
 *
 * API surface:
 * - register() — Add a program
 * - createAccount() — Allocate empty storage owned by a program
 * - setAccount() / getAccount() — Out-of-band provisioning and reads
 * - processTransaction() — Execute a transaction atomically
 * - stateHash() — Fingerprint of committed state
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { Address, Instruction, Transaction } from "@chronovault/types";
import { AccountInfo } from "./account-info.js";
import { AccountStore } from "./account-store.js";
import type { AccountRecord } from "./account-store.js";
import type { TimeSource } from "./clock.js";
import { RuntimeError, errorCodeOf } from "./errors.js";
import { InvokeContext } from "./invoke-context.js";
import type {
  CallerPrivileges,
  InvocationHost,
  TransactionFrame,
} from "./invoke-context.js";
import type { Program, TransactionReceipt } from "./types.js";

/** Default nesting limit; a top-level instruction is depth 1. */
export const DEFAULT_MAX_INVOKE_DEPTH = 4;

export interface RuntimeOptions {
  readonly timeSource: TimeSource;
  readonly logger?: Logger | undefined;
  readonly maxInvokeDepth?: number | undefined;
}

export class Runtime implements InvocationHost {
  readonly timeSource: TimeSource;
  readonly maxInvokeDepth: number;
  private readonly _store = new AccountStore();
  private readonly _programs = new Map<Address, Program>();
  private readonly _logger: Logger;

  constructor(options: RuntimeOptions) {
    this.timeSource = options.timeSource;
    this.maxInvokeDepth = options.maxInvokeDepth ?? DEFAULT_MAX_INVOKE_DEPTH;
    this._logger = options.logger ?? pino({ enabled: false });
  }

  // ─── Programs ────────────────────────────────────────────────────────

  register(program: Program): void {
    if (this._programs.has(program.programId)) {
      throw new RuntimeError(
        "INVALID_ARGUMENT",
        `Program already registered: ${program.programId}`,
      );
    }
    this._programs.set(program.programId, program);
  }

  // ─── Accounts (out-of-band) ──────────────────────────────────────────

  /**
   * Allocate an empty storage slot owned by `owner`.
   */
  createAccount(address: Address, owner: Address): void {
    if (this._store.has(address)) {
      throw new RuntimeError("INVALID_ARGUMENT", `Account already exists: ${address}`);
    }
    this._store.set(address, { owner, data: new Uint8Array(0) });
  }

  setAccount(address: Address, record: AccountRecord): void {
    this._store.set(address, record);
  }

  getAccount(address: Address): AccountRecord | undefined {
    return this._store.get(address);
  }

  stateHash(): string {
    return this._store.stateHash();
  }

  // ─── Transactions ────────────────────────────────────────────────────

  /**
   * Execute every instruction in order and commit only if all succeed.
   */
  processTransaction(tx: Transaction): TransactionReceipt {
    const frame: TransactionFrame = { staged: this._store.begin(), logs: [], failures: [] };
    const signers = new Set(tx.signers);

    try {
      for (const instruction of tx.instructions) {
        const writable = new Set(
          instruction.accounts.filter((m) => m.isWritable).map((m) => m.address),
        );
        this.dispatch(instruction, { signers, writable }, 1, frame);
      }
      // A caller may catch a nested failure, but the transaction still aborts.
      const [failure] = frame.failures;
      if (frame.failures.length > 0) {
        throw failure;
      }
    } catch (err) {
      this._logger.warn(
        { code: errorCodeOf(err), logs: frame.logs.map((l) => l.message) },
        "Transaction rolled back",
      );
      throw err;
    }

    this._store.commit(frame.staged);
    for (const line of frame.logs) {
      this._logger.debug({ programId: line.programId, depth: line.depth }, line.message);
    }
    const stateHash = this._store.stateHash();
    this._logger.info(
      { instructions: tx.instructions.length, stateHash },
      "Transaction committed",
    );

    return {
      instructionCount: tx.instructions.length,
      logs: frame.logs,
      stateHash,
    };
  }

  /** @internal Invoked for top-level instructions and by InvokeContext. */
  dispatch(
    instruction: Instruction,
    caller: CallerPrivileges,
    depth: number,
    frame: TransactionFrame,
  ): void {
    if (depth > this.maxInvokeDepth) {
      throw this.recordFailure(frame, new RuntimeError(
        "CALL_DEPTH_EXCEEDED",
        `Invocation depth ${String(depth)} exceeds limit ${String(this.maxInvokeDepth)}`,
      ));
    }

    const program = this._programs.get(instruction.programId);
    if (program === undefined) {
      throw this.recordFailure(
        frame,
        new RuntimeError("UNKNOWN_PROGRAM", `Unknown program: ${instruction.programId}`),
      );
    }

    const nested = depth > 1;
    const accounts = instruction.accounts.map((meta) => {
      const privileged = caller.signers.has(meta.address);
      if (nested && meta.isSigner && !privileged) {
        throw this.recordFailure(frame, new RuntimeError(
          "PRIVILEGE_ESCALATION",
          `Nested instruction requires a signature from ${meta.address}`,
        ));
      }
      if (nested && meta.isWritable && !caller.writable.has(meta.address)) {
        throw this.recordFailure(frame, new RuntimeError(
          "PRIVILEGE_ESCALATION",
          `Nested instruction requires write access to ${meta.address}`,
        ));
      }
      return new AccountInfo(
        meta.address,
        meta.isSigner && privileged,
        meta.isWritable,
        frame.staged,
        program.programId,
      );
    });

    const privileges: CallerPrivileges = {
      signers: new Set(accounts.filter((a) => a.isSigner).map((a) => a.address)),
      writable: new Set(accounts.filter((a) => a.isWritable).map((a) => a.address)),
    };
    const ctx = new InvokeContext(this, program.programId, depth, privileges, frame);

    ctx.log(`invoke [${String(depth)}]`);
    try {
      program.process(ctx, accounts, instruction.data);
    } catch (err) {
      ctx.log(`failed: ${errorCodeOf(err)}`);
      frame.failures.push(err);
      throw err;
    }
    ctx.log("success");
  }

  /** Record a failed invocation on the frame so the transaction aborts. */
  private recordFailure(frame: TransactionFrame, error: RuntimeError): RuntimeError {
    frame.failures.push(error);
    return error;
  }
}
