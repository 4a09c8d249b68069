/**
 * @chronovault/ledger — Token ledger program.
 *
 * Holds per-owner token balances and moves them between accounts of the
 * same mint. Authorization is by signature of the source account's owner;
 * the host decides who counts as a signer, so a program-derived address
 * is accepted exactly like a key holder.
 *
 * Rules:
 * - Token accounts are storage owned by the ledger program
 * - Every balance change is checked u64 arithmetic
 * - A transfer moves the full amount or throws
 * - A mint may carry a transfer hook, invoked after balances move
 */

import { BinaryWriter, RuntimeError } from "@chronovault/runtime";
import type { AccountInfo, InvokeContext, Program } from "@chronovault/runtime";
import type { Address, TokenAccount } from "@chronovault/types";
import { decodeLedgerInstruction } from "./instructions.js";
import { encodeTokenAccount, readTokenAccount } from "./token-account.js";
import { checkedAddU64, checkedSubU64 } from "./u64-math.js";
import { LEDGER_PROGRAM_ID, LedgerError } from "./types.js";

export interface LedgerProgramOptions {
  readonly programId?: Address;
  /** mint → program invoked after every transfer of that mint */
  readonly transferHooks?: ReadonlyMap<Address, Address>;
}

export class LedgerProgram implements Program {
  readonly programId: Address;
  private readonly _hooks: ReadonlyMap<Address, Address>;

  constructor(options: LedgerProgramOptions = {}) {
    this.programId = options.programId ?? LEDGER_PROGRAM_ID;
    this._hooks = options.transferHooks ?? new Map<Address, Address>();
  }

  process(ctx: InvokeContext, accounts: readonly AccountInfo[], data: Uint8Array): void {
    const instruction = decodeLedgerInstruction(data);
    switch (instruction.kind) {
      case "initializeAccount":
        this._initializeAccount(ctx, accounts, { mint: instruction.mint, owner: instruction.owner, amount: 0n });
        return;
      case "mintTo":
        this._mintTo(ctx, accounts, instruction.amount);
        return;
      case "transfer":
        this._transfer(ctx, accounts, instruction.amount);
        return;
    }
  }

  // ─── InitializeAccount ───────────────────────────────────────────────

  private _initializeAccount(
    ctx: InvokeContext,
    accounts: readonly AccountInfo[],
    initial: TokenAccount,
  ): void {
    const [account] = accounts;
    if (account === undefined) {
      throw new RuntimeError("NOT_ENOUGH_ACCOUNT_KEYS", "InitializeAccount needs [account]");
    }
    if (account.owner !== this.programId) {
      throw new RuntimeError(
        "INVALID_ACCOUNT_OWNER",
        `Account ${account.address} is not owned by the ledger`,
      );
    }
    if (!account.isEmpty) {
      throw new LedgerError(
        "ACCOUNT_ALREADY_INITIALIZED",
        `Token account ${account.address} is already initialized`,
      );
    }

    account.setData(encodeTokenAccount(initial));
    ctx.log(`Initialized token account ${account.address}`);
  }

  // ─── MintTo ──────────────────────────────────────────────────────────

  private _mintTo(ctx: InvokeContext, accounts: readonly AccountInfo[], amount: bigint): void {
    const [account, mint] = accounts;
    if (account === undefined || mint === undefined) {
      throw new RuntimeError("NOT_ENOUGH_ACCOUNT_KEYS", "MintTo needs [account, mint]");
    }

    const state = readTokenAccount(account, this.programId);
    if (state.mint !== mint.address) {
      throw new LedgerError(
        "MINT_MISMATCH",
        `Account holds mint ${state.mint}, not ${mint.address}`,
      );
    }
    if (!mint.isSigner) {
      throw new LedgerError("MISSING_AUTHORITY_SIGNATURE", `Mint ${mint.address} must sign`);
    }

    account.setData(encodeTokenAccount({ ...state, amount: checkedAddU64(state.amount, amount) }));
    ctx.log(`MintTo ${amount.toString()}`);
  }

  // ─── Transfer ────────────────────────────────────────────────────────

  private _transfer(ctx: InvokeContext, accounts: readonly AccountInfo[], amount: bigint): void {
    const [source, destination, authority, ...extra] = accounts;
    if (source === undefined || destination === undefined || authority === undefined) {
      throw new RuntimeError(
        "NOT_ENOUGH_ACCOUNT_KEYS",
        "Transfer needs [source, destination, authority]",
      );
    }

    const from = readTokenAccount(source, this.programId);
    const to = readTokenAccount(destination, this.programId);

    if (authority.address !== from.owner) {
      throw new LedgerError(
        "OWNER_MISMATCH",
        `Authority ${authority.address} does not own ${source.address}`,
      );
    }
    if (!authority.isSigner) {
      throw new LedgerError(
        "MISSING_AUTHORITY_SIGNATURE",
        `Authority ${authority.address} must sign`,
      );
    }
    if (from.mint !== to.mint) {
      throw new LedgerError(
        "MINT_MISMATCH",
        `Cannot transfer mint ${from.mint} into an account holding ${to.mint}`,
      );
    }

    const remaining = checkedSubU64(from.amount, amount);
    if (source.address !== destination.address) {
      const credited = checkedAddU64(to.amount, amount);
      source.setData(encodeTokenAccount({ ...from, amount: remaining }));
      destination.setData(encodeTokenAccount({ ...to, amount: credited }));
    }
    ctx.log(`Transfer ${amount.toString()}`);

    const hook = this._hooks.get(from.mint);
    if (hook !== undefined) {
      ctx.invoke({
        programId: hook,
        accounts: [source, destination, authority, ...extra].map((a) => ({
          address: a.address,
          isSigner: a.isSigner,
          isWritable: a.isWritable,
        })),
        data: new BinaryWriter().u64(amount).toBytes(),
      });
    }
  }
}
