/**
 * Shared fixtures for ledger tests.
 */

import {
  BinaryReader,
  ManualClock,
  Runtime,
  RuntimeError,
  addressFromLabel,
  errorCodeOf,
} from "@chronovault/runtime";
import type { Program } from "@chronovault/runtime";
import type { Address } from "@chronovault/types";
import { LedgerProgram } from "../src/ledger-program.js";
import type { LedgerProgramOptions } from "../src/ledger-program.js";
import { initializeAccountInstruction, mintToInstruction } from "../src/instructions.js";
import { decodeTokenAccount } from "../src/token-account.js";
import { LEDGER_PROGRAM_ID } from "../src/types.js";

export const MINT = addressFromLabel("test:mint");
export const OTHER_MINT = addressFromLabel("test:other-mint");

export const ALICE = addressFromLabel("test:alice");
export const BOB = addressFromLabel("test:bob");

export const ALICE_TOKENS = addressFromLabel("test:alice-tokens");
export const BOB_TOKENS = addressFromLabel("test:bob-tokens");

export const RECORDER_ID = addressFromLabel("test:hook-recorder");
export const REJECTER_ID = addressFromLabel("test:hook-rejecter");

/** Transfer hook that logs how many accounts it saw and the amount moved. */
export const recorder: Program = {
  programId: RECORDER_ID,
  process(ctx, accounts, data) {
    const amount = new BinaryReader(data).u64();
    ctx.log(`hook ${String(accounts.length)} ${amount.toString()}`);
  },
};

/** Transfer hook that vetoes every transfer. */
export const rejecter: Program = {
  programId: REJECTER_ID,
  process() {
    throw new RuntimeError("INVALID_ARGUMENT", "transfer vetoed");
  },
};

export function setupLedger(options?: LedgerProgramOptions): Runtime {
  const runtime = new Runtime({ timeSource: new ManualClock(1_000n) });
  runtime.register(new LedgerProgram(options));
  runtime.register(recorder);
  runtime.register(rejecter);
  return runtime;
}

/** Allocate, initialize and optionally fund a token account. */
export function openTokenAccount(
  runtime: Runtime,
  address: Address,
  mint: Address,
  owner: Address,
  amount = 0n,
): void {
  runtime.createAccount(address, LEDGER_PROGRAM_ID);
  const instructions = [initializeAccountInstruction(address, mint, owner)];
  if (amount > 0n) {
    instructions.push(mintToInstruction(address, mint, amount));
  }
  runtime.processTransaction({ instructions, signers: [mint] });
}

export function balanceOf(runtime: Runtime, address: Address): bigint {
  const record = runtime.getAccount(address);
  if (record === undefined) {
    throw new Error(`No account ${address}`);
  }
  return decodeTokenAccount(record.data).amount;
}

/** Run `fn` and return the code of whatever it throws. */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return errorCodeOf(err);
  }
  return undefined;
}
