#!/usr/bin/env node
/**
 * @chronovault/demo — Interactive CLI walkthrough.
 *
 * Runs one time-locked deposit through its whole life in your terminal:
 * create vault -> deposit -> early withdraw (rejected) -> advance clock ->
 * withdraw -> second withdraw (rejected) -> summary
 *
 * Uses the programs directly on an in-process runtime with a manual clock.
 * Set LOG_LEVEL to see the runtime's structured logs alongside.
 */

import chalk from "chalk";
import {
  LEDGER_PROGRAM_ID,
  LedgerProgram,
  decodeTokenAccount,
  formatAmount,
  initializeAccountInstruction,
  mintToInstruction,
} from "@chronovault/ledger";
import {
  ManualClock,
  Runtime,
  addressFromLabel,
  createLogger,
  errorCodeOf,
  loadConfig,
} from "@chronovault/runtime";
import type { TransactionReceipt } from "@chronovault/runtime";
import type { Address, Instruction } from "@chronovault/types";
import {
  VAULT_PROGRAM_ID,
  VaultProgram,
  createVaultInstruction,
  depositInstruction,
  loadVault,
  tagFromString,
  tagToString,
  vaultAuthority,
  withdrawInstruction,
} from "@chronovault/vault";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;
const TOTAL_STEPS = 7;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("      Chronovault — Time-Locked Deposits      ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("   Custody that opens on schedule, once only  ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  console.log();
  console.log(chalk.yellow.bold(`  [${step}/${total}] ${title}`));
  console.log(chalk.gray("  " + "─".repeat(46)));
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.white(msg));
}

function short(hash: string): string {
  return hash.slice(0, 16) + "..." + hash.slice(-8);
}

function hashLine(label: string, hash: string): void {
  info(label, chalk.yellow(short(hash)));
}

// =============================================================================
// World
// =============================================================================

const MINT = addressFromLabel("demo:mint");
const OWNER = addressFromLabel("demo:owner");
const ALICE = addressFromLabel("demo:alice");
const VAULT = addressFromLabel("demo:vault");
const CUSTODY = addressFromLabel("demo:custody");
const ALICE_TOKENS = addressFromLabel("demo:alice-tokens");

const START = 1_700_000_000n;
const DECIMALS = 2;

function balanceOf(runtime: Runtime, account: Address): string {
  const record = runtime.getAccount(account);
  if (record === undefined) return "-";
  return formatAmount(decodeTokenAccount(record.data).amount, DECIMALS);
}

/**
 * Submit a transaction that is expected to fail and report its code.
 * A success here means the walkthrough itself is broken.
 */
function expectRejection(runtime: Runtime, instruction: Instruction, signer: Address): string {
  try {
    runtime.processTransaction({ instructions: [instruction], signers: [signer] });
  } catch (err: unknown) {
    return errorCodeOf(err);
  }
  throw new Error("Transaction was expected to fail but committed");
}

function lastProgramLine(receipt: TransactionReceipt): string {
  const lines = receipt.logs.filter((l) => l.depth === 1 && !l.message.startsWith("invoke") && l.message !== "success");
  return lines.at(-1)?.message ?? "";
}

// =============================================================================
// Walkthrough
// =============================================================================

async function run(): Promise<void> {
  banner();

  const config = loadConfig({ LOG_LEVEL: "silent", ...process.env });
  const logger = createLogger(config);
  const clock = new ManualClock(START);
  const runtime = new Runtime({
    timeSource: clock,
    logger,
    maxInvokeDepth: config.MAX_INVOKE_DEPTH,
  });
  runtime.register(new LedgerProgram());
  runtime.register(new VaultProgram());

  const authority = vaultAuthority(VAULT_PROGRAM_ID, VAULT);
  const tag = tagFromString("Rent");

  const withdrawal = withdrawInstruction({
    depositor: ALICE,
    vault: VAULT,
    destination: ALICE_TOKENS,
    source: CUSTODY,
    depositId: 0n,
  });

  // ─── Step 1: Accounts ───────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Open token accounts");

  runtime.createAccount(ALICE_TOKENS, LEDGER_PROGRAM_ID);
  runtime.createAccount(CUSTODY, LEDGER_PROGRAM_ID);
  runtime.processTransaction({
    instructions: [
      initializeAccountInstruction(ALICE_TOKENS, MINT, ALICE),
      mintToInstruction(ALICE_TOKENS, MINT, 50_000n),
      initializeAccountInstruction(CUSTODY, MINT, authority),
    ],
    signers: [MINT],
  });

  ok("Alice's token account funded");
  info("Alice", balanceOf(runtime, ALICE_TOKENS));
  ok("Custody account owned by the vault authority");
  info("Authority", short(authority));

  await sleep(DELAY_MS);

  // ─── Step 2: Create vault ───────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Create vault");

  runtime.createAccount(VAULT, VAULT_PROGRAM_ID);
  runtime.processTransaction({
    instructions: [createVaultInstruction({ owner: OWNER, vault: VAULT })],
    signers: [OWNER],
  });

  ok("Vault initialized");
  info("Owner", short(OWNER));
  info("Deposits", "0");

  await sleep(DELAY_MS);

  // ─── Step 3: Deposit ────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Deposit 100.00 until now + 100s");

  const receipt = runtime.processTransaction({
    instructions: [
      depositInstruction({
        depositor: ALICE,
        vault: VAULT,
        source: ALICE_TOKENS,
        destination: CUSTODY,
        amount: 10_000n,
        unlockTime: START + 100n,
        tag,
      }),
    ],
    signers: [ALICE],
  });

  ok(lastProgramLine(receipt));
  info("Tag", tagToString(tag));
  info("Alice", balanceOf(runtime, ALICE_TOKENS));
  info("Custody", balanceOf(runtime, CUSTODY));
  hashLine("State hash", receipt.stateHash);

  await sleep(DELAY_MS);

  // ─── Step 4: Early withdrawal ───────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Withdraw at now + 50s");

  clock.advance(50n);
  const before = runtime.stateHash();
  const early = expectRejection(runtime, withdrawal, ALICE);

  warn(`Rejected: ${chalk.red.bold(early)}`);
  info("Clock", String(clock.now()));
  info("Unlocks at", String(START + 100n));
  ok(runtime.stateHash() === before ? "State unchanged" : "State changed");

  await sleep(DELAY_MS);

  // ─── Step 5: Withdrawal after unlock ────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Withdraw at now + 150s");

  clock.advance(100n);
  const released = runtime.processTransaction({ instructions: [withdrawal], signers: [ALICE] });

  ok(lastProgramLine(released));
  info("Alice", balanceOf(runtime, ALICE_TOKENS));
  info("Custody", balanceOf(runtime, CUSTODY));
  hashLine("State hash", released.stateHash);

  await sleep(DELAY_MS);

  // ─── Step 6: Second withdrawal ──────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Withdraw the same deposit again");

  const again = expectRejection(runtime, withdrawal, ALICE);
  warn(`Rejected: ${chalk.red.bold(again)}`);
  info("Alice", balanceOf(runtime, ALICE_TOKENS));

  await sleep(DELAY_MS);

  // ─── Step 7: Summary ────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Summary");

  const record = runtime.getAccount(VAULT);
  const vault = loadVault(record?.data ?? new Uint8Array(0));

  console.log();
  console.log(chalk.white("    Deposits recorded:   ") + chalk.cyan.bold(String(vault.depositCount)));
  for (const d of vault.deposits) {
    console.log(
      chalk.white(`    Deposit ${d.id}:           `) +
        chalk.cyan.bold(`${formatAmount(d.amount, DECIMALS)} "${tagToString(d.tag)}" `) +
        (d.withdrawn ? chalk.green.bold("withdrawn") : chalk.yellow.bold("locked")),
    );
  }
  console.log(chalk.white("    Reentrancy guard:    ") + chalk.cyan.bold(vault.reentrancyGuard ? "set" : "clear"));
  console.log(chalk.white("    Global state hash:   ") + chalk.yellow(short(runtime.stateHash())));

  console.log();
  console.log(chalk.gray("    Funds leave custody once, to the depositor,"));
  console.log(chalk.gray("    and not before the clock says so."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
