/**
 * Tests for deposit tag helpers.
 */

import { describe, it, expect } from "vitest";
import { tagFromString, tagToString } from "../src/tag.js";
import { TAG_LENGTH } from "../src/types.js";
import { codeOf } from "./helpers.js";

describe("tags", () => {
  it("zero-pads a short label to the tag size", () => {
    const tag = tagFromString("Rent");
    expect(tag.length).toBe(TAG_LENGTH);
    expect([...tag.subarray(0, 5)]).toEqual([0x52, 0x65, 0x6e, 0x74, 0]);
    expect(tag.subarray(4).every((b) => b === 0)).toBe(true);
  });

  it("reads a label back without its padding", () => {
    expect(tagToString(tagFromString("Rent"))).toBe("Rent");
    expect(tagToString(tagFromString(""))).toBe("");
    expect(tagToString(tagFromString("é".repeat(16)))).toBe("é".repeat(16));
  });

  it("rejects labels longer than the tag", () => {
    expect(codeOf(() => tagFromString("x".repeat(33)))).toBe("INVALID_ARGUMENT");
    expect(codeOf(() => tagFromString("é".repeat(17)))).toBe("INVALID_ARGUMENT");
  });
});
