/**
 * Instruction Types
 *
 * The request shape every program in the runtime consumes: a target
 * program, a positional list of account references with their
 * privileges, and opaque instruction bytes.
 */

import type { Address } from "./identity.js";

/**
 * A positional account reference inside an instruction.
 *
 * The position is part of each program's contract; roles are never
 * looked up by name.
 */
export interface AccountMeta {
  readonly address: Address;

  /** The instruction requires this account's signature */
  readonly isSigner: boolean;

  /** The instruction may modify this account's data */
  readonly isWritable: boolean;
}

/**
 * A single program invocation request.
 */
export interface Instruction {
  /** Program that decodes and executes `data` */
  readonly programId: Address;

  /** Accounts in the order the program expects them */
  readonly accounts: readonly AccountMeta[];

  /** Opaque, program-specific encoding */
  readonly data: Uint8Array;
}

/**
 * A batch of instructions executed all-or-nothing, with the set of
 * identities whose signatures the host has already verified.
 */
export interface Transaction {
  readonly instructions: readonly Instruction[];
  readonly signers: readonly Address[];
}
