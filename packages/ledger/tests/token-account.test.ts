/**
 * Tests for the token account layout.
 */

import { describe, it, expect } from "vitest";
import { U64_MAX } from "@chronovault/types";
import { decodeTokenAccount, encodeTokenAccount } from "../src/token-account.js";
import { TOKEN_ACCOUNT_SIZE } from "../src/types.js";
import { ALICE, MINT, codeOf } from "./helpers.js";

describe("token account layout", () => {
  it("encodes to exactly TOKEN_ACCOUNT_SIZE bytes", () => {
    const bytes = encodeTokenAccount({ mint: MINT, owner: ALICE, amount: U64_MAX });
    expect(TOKEN_ACCOUNT_SIZE).toBe(72);
    expect(bytes.length).toBe(TOKEN_ACCOUNT_SIZE);
  });

  it("stores the amount little-endian after mint and owner", () => {
    const bytes = encodeTokenAccount({ mint: MINT, owner: ALICE, amount: 258n });
    expect(Array.from(bytes.slice(64))).toEqual([2, 1, 0, 0, 0, 0, 0, 0]);
  });

  it.each<[string, number]>([
    ["short", TOKEN_ACCOUNT_SIZE - 1],
    ["long", TOKEN_ACCOUNT_SIZE + 1],
    ["empty", 0],
  ])("rejects a %s buffer", (_label, length) => {
    expect(codeOf(() => decodeTokenAccount(new Uint8Array(length)))).toBe(
      "INVALID_ACCOUNT_DATA",
    );
  });
});
