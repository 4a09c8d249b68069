/**
 * @chronovault/runtime — Address encoding and derivation.
 *
 * Addresses travel as hex strings and are stored as 32 raw bytes.
 * Derived addresses are identities a program controls without a private
 * key: the host recognizes them as signers when the owning program
 * presents the seeds they were derived from.
 *
 *   derived = sha256(seed[0] ‖ … ‖ seed[n] ‖ programId ‖ "ProgramDerivedAddress")
 */

import { createHash } from "node:crypto";
import { ADDRESS_LENGTH, isAddress } from "@chronovault/types";
import type { Address } from "@chronovault/types";
import { RuntimeError } from "./errors.js";

/** Marker appended to every derivation so derived and labelled identities never collide. */
const DERIVATION_MARKER = "ProgramDerivedAddress";

/** Longest seed accepted by {@link deriveAddress}. */
export const MAX_SEED_LENGTH = 32;

/** Most seeds accepted by {@link deriveAddress}. */
export const MAX_SEEDS = 16;

/** Owner of every account no program has claimed yet. */
export const SYSTEM_PROGRAM_ID: Address = "00".repeat(ADDRESS_LENGTH);

export function addressToBytes(address: Address): Uint8Array {
  if (!isAddress(address)) {
    throw new RuntimeError("INVALID_ARGUMENT", `Invalid address: "${address}"`);
  }
  return Uint8Array.from(Buffer.from(address, "hex"));
}

export function addressFromBytes(bytes: Uint8Array): Address {
  if (bytes.length !== ADDRESS_LENGTH) {
    throw new RuntimeError(
      "INVALID_ARGUMENT",
      `Address must be ${String(ADDRESS_LENGTH)} bytes, got ${String(bytes.length)}`,
    );
  }
  return Buffer.from(bytes).toString("hex");
}

/**
 * Deterministic identity for a human-readable label.
 * Used for well-known program ids, sysvars, and fixtures.
 */
export function addressFromLabel(label: string): Address {
  return createHash("sha256").update(label, "utf8").digest("hex");
}

/**
 * Derive the address a program controls for the given seeds.
 */
export function deriveAddress(
  programId: Address,
  seeds: readonly Uint8Array[],
): Address {
  if (seeds.length > MAX_SEEDS) {
    throw new RuntimeError(
      "INVALID_ARGUMENT",
      `At most ${String(MAX_SEEDS)} seeds allowed, got ${String(seeds.length)}`,
    );
  }

  const hash = createHash("sha256");
  for (const seed of seeds) {
    if (seed.length > MAX_SEED_LENGTH) {
      throw new RuntimeError(
        "INVALID_ARGUMENT",
        `Seed exceeds ${String(MAX_SEED_LENGTH)} bytes`,
      );
    }
    hash.update(seed);
  }
  hash.update(addressToBytes(programId));
  hash.update(DERIVATION_MARKER, "utf8");

  return hash.digest("hex");
}
