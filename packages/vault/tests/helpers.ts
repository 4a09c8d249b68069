/**
 * Shared fixtures for vault tests.
 *
 * Every fixture starts from the same world: a ledger, the vault program,
 * one created vault with an empty custody account, and two funded
 * depositors. The clock starts at START.
 */

import {
  LEDGER_PROGRAM_ID,
  LedgerProgram,
  decodeTokenAccount,
  initializeAccountInstruction,
  mintToInstruction,
} from "@chronovault/ledger";
import {
  ManualClock,
  Runtime,
  addressFromLabel,
  errorCodeOf,
} from "@chronovault/runtime";
import type { Program, TransactionReceipt } from "@chronovault/runtime";
import type { AccountMeta, Address, Timestamp } from "@chronovault/types";
import { vaultAuthority } from "../src/authorization.js";
import {
  createVaultInstruction,
  depositInstruction,
  withdrawInstruction,
} from "../src/builders.js";
import { VaultProgram } from "../src/processor.js";
import { encodeVault, loadVault } from "../src/state.js";
import { tagFromString } from "../src/tag.js";
import { VAULT_PROGRAM_ID } from "../src/types.js";
import type { Vault } from "../src/types.js";

export const START: Timestamp = 1_000n;

export const MINT = addressFromLabel("test:mint");
export const OWNER = addressFromLabel("test:owner");
export const ALICE = addressFromLabel("test:alice");
export const BOB = addressFromLabel("test:bob");
export const RESCUER = addressFromLabel("test:rescuer");

export const VAULT = addressFromLabel("test:vault");
export const CUSTODY = addressFromLabel("test:custody");
export const ALICE_TOKENS = addressFromLabel("test:alice-tokens");
export const BOB_TOKENS = addressFromLabel("test:bob-tokens");

export const AUTHORITY = vaultAuthority(VAULT_PROGRAM_ID, VAULT);

export const RENT = tagFromString("Rent");

export interface Fixture {
  readonly runtime: Runtime;
  readonly clock: ManualClock;
}

export interface FixtureOptions {
  readonly transferHooks?: ReadonlyMap<Address, Address>;
  readonly programs?: readonly Program[];
}

/** Allocate, initialize and optionally fund a token account. */
export function openTokenAccount(
  runtime: Runtime,
  address: Address,
  owner: Address,
  amount = 0n,
  mint: Address = MINT,
): void {
  runtime.createAccount(address, LEDGER_PROGRAM_ID);
  const instructions = [initializeAccountInstruction(address, mint, owner)];
  if (amount > 0n) {
    instructions.push(mintToInstruction(address, mint, amount));
  }
  runtime.processTransaction({ instructions, signers: [mint] });
}

export function setup(options: FixtureOptions = {}): Fixture {
  const clock = new ManualClock(START);
  const runtime = new Runtime({ timeSource: clock });
  runtime.register(
    options.transferHooks === undefined
      ? new LedgerProgram()
      : new LedgerProgram({ transferHooks: options.transferHooks }),
  );
  runtime.register(new VaultProgram());
  for (const program of options.programs ?? []) {
    runtime.register(program);
  }

  openTokenAccount(runtime, ALICE_TOKENS, ALICE, 1_000n);
  openTokenAccount(runtime, BOB_TOKENS, BOB, 1_000n);
  openTokenAccount(runtime, CUSTODY, AUTHORITY);

  runtime.createAccount(VAULT, VAULT_PROGRAM_ID);
  runtime.processTransaction({
    instructions: [createVaultInstruction({ owner: OWNER, vault: VAULT })],
    signers: [OWNER],
  });

  return { runtime, clock };
}

// ─── Operations ──────────────────────────────────────────────────────────

export interface DepositOptions {
  readonly amount?: bigint;
  readonly unlockTime?: Timestamp;
  readonly depositor?: Address;
  readonly source?: Address;
  readonly signers?: readonly Address[];
  readonly remainingAccounts?: readonly AccountMeta[];
}

export function deposit(fx: Fixture, options: DepositOptions = {}): TransactionReceipt {
  const depositor = options.depositor ?? ALICE;
  return fx.runtime.processTransaction({
    instructions: [
      depositInstruction({
        depositor,
        vault: VAULT,
        source: options.source ?? ALICE_TOKENS,
        destination: CUSTODY,
        amount: options.amount ?? 100n,
        unlockTime: options.unlockTime ?? START + 100n,
        tag: RENT,
        remainingAccounts: options.remainingAccounts ?? [],
      }),
    ],
    signers: options.signers ?? [depositor],
  });
}

export interface WithdrawOptions {
  readonly depositor?: Address;
  readonly destination?: Address;
  readonly signers?: readonly Address[];
  readonly remainingAccounts?: readonly AccountMeta[];
}

export function withdraw(
  fx: Fixture,
  depositId: bigint,
  options: WithdrawOptions = {},
): TransactionReceipt {
  const depositor = options.depositor ?? ALICE;
  return fx.runtime.processTransaction({
    instructions: [
      withdrawInstruction({
        depositor,
        vault: VAULT,
        destination: options.destination ?? ALICE_TOKENS,
        source: CUSTODY,
        depositId,
        remainingAccounts: options.remainingAccounts ?? [],
      }),
    ],
    signers: options.signers ?? [depositor],
  });
}

// ─── Reads ───────────────────────────────────────────────────────────────

export function readVault(runtime: Runtime, address: Address = VAULT): Vault {
  const record = runtime.getAccount(address);
  if (record === undefined) {
    throw new Error(`No account ${address}`);
  }
  return loadVault(record.data);
}

/** Overwrite committed vault state out-of-band. */
export function provisionVault(runtime: Runtime, vault: Vault, address: Address = VAULT): void {
  runtime.setAccount(address, { owner: VAULT_PROGRAM_ID, data: encodeVault(vault) });
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
