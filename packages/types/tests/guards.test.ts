/**
 * Runtime type guard tests for @chronovault/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isU64,
  isI64,
  isAccountMeta,
  isInstruction,
  isTokenAccount,
} from "../src/guards.js";
import { I64_MAX, I64_MIN, U64_MAX } from "../src/identity.js";

const ALICE = "a1".repeat(32);
const MINT = "0f".repeat(32);

// =============================================================================
// Identity guards
// =============================================================================

describe("isAddress", () => {
  it("accepts 64 lowercase hex characters", () => {
    expect(isAddress(ALICE)).toBe(true);
    expect(isAddress("0".repeat(64))).toBe(true);
  });

  it("rejects uppercase hex", () => {
    expect(isAddress("A1".repeat(32))).toBe(false);
  });

  it("rejects wrong length", () => {
    expect(isAddress("a1".repeat(31))).toBe(false);
    expect(isAddress("a1".repeat(33))).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAddress(null)).toBe(false);
    expect(isAddress(42)).toBe(false);
    expect(isAddress(new Uint8Array(32))).toBe(false);
  });
});

describe("isU64", () => {
  it("accepts the full unsigned range", () => {
    expect(isU64(0n)).toBe(true);
    expect(isU64(U64_MAX)).toBe(true);
  });

  it("rejects out-of-range and non-bigint values", () => {
    expect(isU64(-1n)).toBe(false);
    expect(isU64(U64_MAX + 1n)).toBe(false);
    expect(isU64(5)).toBe(false);
  });
});

describe("isI64", () => {
  it("accepts the signed range bounds", () => {
    expect(isI64(I64_MIN)).toBe(true);
    expect(isI64(I64_MAX)).toBe(true);
  });

  it("rejects values past either bound", () => {
    expect(isI64(I64_MIN - 1n)).toBe(false);
    expect(isI64(I64_MAX + 1n)).toBe(false);
  });
});

// =============================================================================
// Instruction guards
// =============================================================================

describe("isAccountMeta", () => {
  it("accepts a valid meta", () => {
    expect(isAccountMeta({ address: ALICE, isSigner: true, isWritable: false })).toBe(true);
  });

  it("rejects missing privilege flags", () => {
    expect(isAccountMeta({ address: ALICE, isSigner: true })).toBe(false);
  });

  it("rejects malformed address", () => {
    expect(isAccountMeta({ address: "alice", isSigner: false, isWritable: false })).toBe(false);
  });
});

describe("isInstruction", () => {
  it("accepts a valid instruction", () => {
    expect(
      isInstruction({
        programId: MINT,
        accounts: [{ address: ALICE, isSigner: true, isWritable: true }],
        data: Uint8Array.of(0),
      }),
    ).toBe(true);
  });

  it("rejects array data", () => {
    expect(isInstruction({ programId: MINT, accounts: [], data: [0] })).toBe(false);
  });

  it("rejects a malformed account entry", () => {
    expect(
      isInstruction({ programId: MINT, accounts: [{ address: ALICE }], data: new Uint8Array() }),
    ).toBe(false);
  });
});

// =============================================================================
// Token guards
// =============================================================================

describe("isTokenAccount", () => {
  it("accepts a valid balance record", () => {
    expect(isTokenAccount({ mint: MINT, owner: ALICE, amount: 100n })).toBe(true);
  });

  it("rejects a numeric amount", () => {
    expect(isTokenAccount({ mint: MINT, owner: ALICE, amount: 100 })).toBe(false);
  });

  it("rejects null", () => {
    expect(isTokenAccount(null)).toBe(false);
  });
});
