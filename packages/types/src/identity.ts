/**
 * Identity Types
 *
 * Every actor, program, and storage slot in the stack is addressed by a
 * 32-byte identity. Identities are carried as lowercase hex strings so they
 * compare with `===` and serialize without ceremony.
 *
 * Rules:
 * - An address is always 64 lowercase hex characters
 * - Timestamps are unix seconds carried as bigint (i64 range)
 * - Token quantities are bigint (u64 range)
 */

/**
 * A 32-byte identity, hex-encoded (e.g. a depositor, a program, a vault slot).
 */
export type Address = string;

/**
 * Unix timestamp in seconds. Signed 64-bit range.
 */
export type Timestamp = bigint;

/** Length in bytes of every address. */
export const ADDRESS_LENGTH = 32;

/** Largest value representable as u64. */
export const U64_MAX = (1n << 64n) - 1n;

/** Smallest value representable as i64. */
export const I64_MIN = -(1n << 63n);

/** Largest value representable as i64. */
export const I64_MAX = (1n << 63n) - 1n;
