/**
 * Shared fixtures for runtime tests: a handful of tiny programs that
 * exercise one host feature each.
 */

import type { Address } from "@chronovault/types";
import { addressFromLabel, deriveAddress } from "../src/address.js";
import { errorCodeOf, RuntimeError } from "../src/errors.js";
import type { Program } from "../src/types.js";

export const WRITER_ID = addressFromLabel("test:writer");
export const FAILER_ID = addressFromLabel("test:failer");
export const GUARDED_ID = addressFromLabel("test:guarded");
export const RELAY_ID = addressFromLabel("test:relay");
export const RECURSIVE_ID = addressFromLabel("test:recursive");
export const TIMER_ID = addressFromLabel("test:timer");
export const SWALLOWER_ID = addressFromLabel("test:swallower");

export const ALICE = addressFromLabel("test:alice");
export const SLOT_A = addressFromLabel("test:slot-a");
export const SLOT_B = addressFromLabel("test:slot-b");

/** Address the relay program can sign for. */
export const RELAY_DERIVED: Address = deriveAddress(RELAY_ID, [Uint8Array.of(7)]);

/** Writes the instruction data into its first account. */
export const writer: Program = {
  programId: WRITER_ID,
  process(ctx, accounts, data) {
    const [target] = accounts;
    if (target === undefined) {
      throw new RuntimeError("NOT_ENOUGH_ACCOUNT_KEYS", "writer needs one account");
    }
    target.setData(data);
    ctx.log(`wrote ${String(data.length)} bytes`);
  },
};

/** Always fails. */
export const failer: Program = {
  programId: FAILER_ID,
  process() {
    throw new RuntimeError("INVALID_ARGUMENT", "failer always fails");
  },
};

/** Succeeds only when its first account signed. */
export const guarded: Program = {
  programId: GUARDED_ID,
  process(_ctx, accounts) {
    const [signer] = accounts;
    if (signer === undefined || !signer.isSigner) {
      throw new RuntimeError("MISSING_REQUIRED_SIGNATURE", "guarded needs a signer");
    }
  },
};

/**
 * Forwards its first account to the guarded program as a signer.
 * Data byte 1 means "sign with seeds [7]".
 */
export const relay: Program = {
  programId: RELAY_ID,
  process(ctx, accounts, data) {
    const [first] = accounts;
    if (first === undefined) {
      throw new RuntimeError("NOT_ENOUGH_ACCOUNT_KEYS", "relay needs one account");
    }
    const seeds = data[0] === 1 ? [[Uint8Array.of(7)]] : [];
    ctx.invoke(
      {
        programId: GUARDED_ID,
        accounts: [{ address: first.address, isSigner: true, isWritable: false }],
        data: new Uint8Array(0),
      },
      seeds,
    );
  },
};

/** Invokes itself forever. */
export const recursive: Program = {
  programId: RECURSIVE_ID,
  process(ctx) {
    ctx.invoke({ programId: RECURSIVE_ID, accounts: [], data: new Uint8Array(0) });
  },
};

/** Logs the current time read through its first account. */
export const timer: Program = {
  programId: TIMER_ID,
  process(ctx, accounts) {
    const [clock] = accounts;
    if (clock === undefined) {
      throw new RuntimeError("NOT_ENOUGH_ACCOUNT_KEYS", "timer needs the clock");
    }
    ctx.log(`now=${ctx.now(clock).toString()}`);
  },
};

/**
 * Has the writer fill its first account, then calls the failer and
 * carries on as if nothing happened.
 */
export const swallower: Program = {
  programId: SWALLOWER_ID,
  process(ctx, accounts) {
    const [slot] = accounts;
    if (slot === undefined) {
      throw new RuntimeError("NOT_ENOUGH_ACCOUNT_KEYS", "swallower needs one account");
    }
    ctx.invoke({
      programId: WRITER_ID,
      accounts: [{ address: slot.address, isSigner: false, isWritable: true }],
      data: Uint8Array.of(5, 5),
    });
    try {
      ctx.invoke({ programId: FAILER_ID, accounts: [], data: new Uint8Array(0) });
    } catch (err) {
      ctx.log(`ignored ${errorCodeOf(err)}`);
    }
  },
};

/** Run `fn` and return the code of whatever it throws. */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return errorCodeOf(err);
  }
  return undefined;
}
