/**
 * Tests for the Deposit handler.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CLOCK_SYSVAR_ID, addressFromLabel } from "@chronovault/runtime";
import { U64_MAX } from "@chronovault/types";
import type { Instruction } from "@chronovault/types";
import { depositInstruction } from "../src/builders.js";
import type { DepositParams } from "../src/builders.js";
import { VaultError } from "../src/errors.js";
import { newVault } from "../src/state.js";
import { VAULT_PROGRAM_ID } from "../src/types.js";
import {
  ALICE,
  ALICE_TOKENS,
  BOB,
  BOB_TOKENS,
  CUSTODY,
  MINT,
  OWNER,
  RENT,
  START,
  VAULT,
  balanceOf,
  codeOf,
  deposit,
  provisionVault,
  readVault,
  setup,
} from "./helpers.js";
import type { Fixture } from "./helpers.js";

function depositWith(overrides: Partial<DepositParams>): Instruction {
  return depositInstruction({
    depositor: ALICE,
    vault: VAULT,
    source: ALICE_TOKENS,
    destination: CUSTODY,
    amount: 100n,
    unlockTime: START + 100n,
    tag: RENT,
    ...overrides,
  });
}

describe("Deposit", () => {
  let fx: Fixture;

  beforeEach(() => {
    fx = setup();
  });

  // ─── Success ─────────────────────────────────────────────────────────

  it("records the deposit and moves funds into custody", () => {
    deposit(fx, { amount: 100n, unlockTime: START + 100n });

    const vault = readVault(fx.runtime);
    expect(vault.depositCount).toBe(1n);
    expect(vault.reentrancyGuard).toBe(false);
    expect(vault.deposits).toEqual([
      {
        id: 0n,
        depositor: ALICE,
        tokenMint: MINT,
        amount: 100n,
        unlockTime: START + 100n,
        withdrawn: false,
        tag: RENT,
        createdAt: START,
      },
    ]);
    expect(balanceOf(fx.runtime, ALICE_TOKENS)).toBe(900n);
    expect(balanceOf(fx.runtime, CUSTODY)).toBe(100n);
  });

  it("logs the transfer and the lock", () => {
    const receipt = deposit(fx, { amount: 100n, unlockTime: START + 100n });
    expect(receipt.logs.map((l) => l.message)).toEqual([
      "invoke [1]",
      "invoke [2]",
      "Transfer 100",
      "success",
      "Deposit 0: 100 locked until 1100",
      "success",
    ]);
  });

  it("assigns sequential ids across depositors", () => {
    deposit(fx);
    deposit(fx, { depositor: BOB, source: BOB_TOKENS, amount: 7n });
    deposit(fx, { amount: 3n });

    const vault = readVault(fx.runtime);
    expect(vault.deposits.map((d) => d.id)).toEqual([0n, 1n, 2n]);
    expect(vault.deposits.map((d) => d.depositor)).toEqual([ALICE, BOB, ALICE]);
    expect(vault.depositCount).toBe(3n);
    expect(balanceOf(fx.runtime, CUSTODY)).toBe(110n);
  });

  it("accepts the source's entire balance", () => {
    deposit(fx, { amount: 1_000n });
    expect(balanceOf(fx.runtime, ALICE_TOKENS)).toBe(0n);
  });

  it("does not change the vault owner", () => {
    deposit(fx);
    expect(readVault(fx.runtime).owner).toBe(OWNER);
  });

  // ─── Validation ──────────────────────────────────────────────────────

  it("rejects a zero amount", () => {
    const before = fx.runtime.stateHash();
    expect(codeOf(() => deposit(fx, { amount: 0n }))).toBe("INVALID_AMOUNT");
    expect(fx.runtime.stateHash()).toBe(before);
  });

  it.each<[string, bigint]>([
    ["equal to now", START],
    ["in the past", START - 1n],
  ])("rejects an unlock time %s", (_label, unlockTime) => {
    expect(codeOf(() => deposit(fx, { unlockTime }))).toBe("INVALID_UNLOCK_TIME");
  });

  it("accepts an unlock time one second ahead", () => {
    deposit(fx, { unlockTime: START + 1n });
    expect(readVault(fx.runtime).deposits[0]?.unlockTime).toBe(START + 1n);
  });

  it("rejects an amount above the source balance and leaves the guard clear", () => {
    const before = fx.runtime.stateHash();
    let caught: unknown;
    try {
      deposit(fx, { amount: 1_001n });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(VaultError);
    expect(caught).toMatchObject({ code: "INSUFFICIENT_FUNDS", numericCode: 9 });
    expect(fx.runtime.stateHash()).toBe(before);
    expect(readVault(fx.runtime).reentrancyGuard).toBe(false);
  });

  it("fails on counter overflow and leaves state unchanged", () => {
    provisionVault(fx.runtime, { ...newVault(OWNER), depositCount: U64_MAX });
    const before = fx.runtime.stateHash();

    expect(codeOf(() => deposit(fx))).toBe("MATH_OVERFLOW");
    expect(fx.runtime.stateHash()).toBe(before);
    expect(readVault(fx.runtime).depositCount).toBe(U64_MAX);
  });

  it("issues the last id before the counter saturates", () => {
    provisionVault(fx.runtime, { ...newVault(OWNER), depositCount: U64_MAX - 1n });
    deposit(fx);

    const vault = readVault(fx.runtime);
    expect(vault.depositCount).toBe(U64_MAX);
    expect(vault.deposits[0]?.id).toBe(U64_MAX - 1n);
  });

  it("rejects entry while the guard is set", () => {
    provisionVault(fx.runtime, { ...newVault(OWNER), reentrancyGuard: true });
    expect(codeOf(() => deposit(fx))).toBe("REENTRANCY_DETECTED");
  });

  // ─── Host-level checks ───────────────────────────────────────────────

  it("requires the depositor's signature", () => {
    expect(codeOf(() => deposit(fx, { signers: [] }))).toBe("MISSING_REQUIRED_SIGNATURE");
  });

  it("cannot spend someone else's tokens", () => {
    const code = codeOf(() => deposit(fx, { depositor: BOB, source: ALICE_TOKENS }));
    expect(code).toBe("OWNER_MISMATCH");
    expect(balanceOf(fx.runtime, ALICE_TOKENS)).toBe(1_000n);
  });

  it("requires the destination to be vault custody", () => {
    const code = codeOf(() =>
      fx.runtime.processTransaction({
        instructions: [depositWith({ destination: BOB_TOKENS })],
        signers: [ALICE],
      }),
    );
    expect(code).toBe("INVALID_ACCOUNT_OWNER");
  });

  it("requires the registered ledger program", () => {
    const code = codeOf(() =>
      fx.runtime.processTransaction({
        instructions: [depositWith({ ledgerProgramId: addressFromLabel("test:fake-ledger") })],
        signers: [ALICE],
      }),
    );
    expect(code).toBe("INCORRECT_PROGRAM_ID");
  });

  it("reads time only from the clock sysvar", () => {
    const instruction = depositWith({});
    const code = codeOf(() =>
      fx.runtime.processTransaction({
        instructions: [
          {
            ...instruction,
            accounts: instruction.accounts.map((m) =>
              m.address === CLOCK_SYSVAR_ID ? { ...m, address: BOB } : m,
            ),
          },
        ],
        signers: [ALICE],
      }),
    );
    expect(code).toBe("INVALID_ARGUMENT");
  });

  it("rejects a vault that was never created", () => {
    const blank = addressFromLabel("test:blank-vault");
    fx.runtime.createAccount(blank, VAULT_PROGRAM_ID);
    const code = codeOf(() =>
      fx.runtime.processTransaction({
        instructions: [depositWith({ vault: blank })],
        signers: [ALICE],
      }),
    );
    expect(code).toBe("INVALID_ACCOUNT_DATA");
  });
});
