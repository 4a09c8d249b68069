/**
 * @chronovault/vault — Deposit labels.
 *
 * A tag is exactly TAG_LENGTH opaque bytes. These helpers store short
 * UTF-8 labels zero-padded and read them back.
 */

import { RuntimeError } from "@chronovault/runtime";
import { TAG_LENGTH } from "./types.js";

export function tagFromString(label: string): Uint8Array {
  const bytes = Buffer.from(label, "utf8");
  if (bytes.length > TAG_LENGTH) {
    throw new RuntimeError(
      "INVALID_ARGUMENT",
      `Tag "${label}" is ${String(bytes.length)} bytes; at most ${String(TAG_LENGTH)} allowed`,
    );
  }
  const tag = new Uint8Array(TAG_LENGTH);
  tag.set(bytes);
  return tag;
}

/** Decode a zero-padded UTF-8 tag; trailing zero bytes are dropped. */
export function tagToString(tag: Uint8Array): string {
  let end = tag.length;
  while (end > 0 && tag[end - 1] === 0) {
    end--;
  }
  return Buffer.from(tag.subarray(0, end)).toString("utf8");
}
