#!/usr/bin/env node
/**
 * @multiledger/demo — Terminal walkthrough.
 *
 * mint -> register -> transfer -> transfer-call -> notify -> resolve -> event log
 *
 * Uses the domain packages directly (no service layer).
 */

import chalk from "chalk";
import { formatAmount, MultiToken } from "@multiledger/ledger";
import type { Invocation } from "@multiledger/ledger";
import { AsyncTransferProtocol, QueueCallScheduler } from "@multiledger/settlement";
import type { TransferNotification } from "@multiledger/settlement";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 500;
const LEDGER = "mt.demo";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function call(caller: string): Invocation {
  return { caller, attachedPayment: 1n, prepaidCompute: 50_000_000_000_000n };
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                    MULTILEDGER DEMO                     ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Many tokens, one ledger, settled transfers       ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(50 - title.length, 4)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function balances(mt: MultiToken, tokenId: string): void {
  for (const [holder, amount] of mt.balances(tokenId)) {
    info(holder, chalk.cyan(formatAmount(amount)));
  }
  info("supply", chalk.cyan.bold(formatAmount(mt.supply(tokenId) ?? 0n)));
}

const TOTAL_STEPS = 7;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const mt = new MultiToken({ accountId: LEDGER, extensions: { metadata: true } });
  ok(`Ledger initialized (account: ${LEDGER}, metadata extension on)`);

  const scheduler = new QueueCallScheduler();
  const settlement = new AsyncTransferProtocol({ ledger: mt, scheduler });
  ok("Settlement protocol initialized (FIFO scheduler, in-memory log)");

  await sleep(DELAY_MS);

  // ─── Step 2: Mint ───────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Mint");

  const gold = mt.mint(call(LEDGER), {
    ownerId: "alice",
    amount: 1000n,
    metadata: { title: "Gold", description: "Fungible reward points" },
  });
  ok(`Token ${gold.tokenId} minted to ${gold.ownerId}`);
  balances(mt, gold.tokenId);

  await sleep(DELAY_MS);

  // ─── Step 3: Register ───────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Register");

  mt.register(call("bob"), gold.tokenId);
  mt.register(call("shop"), gold.tokenId);
  ok("bob and shop hold zero-balance entries");
  balances(mt, gold.tokenId);

  await sleep(DELAY_MS);

  // ─── Step 4: Transfer ───────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Transfer");

  mt.transfer(call("alice"), { receiverId: "bob", tokenId: gold.tokenId, amount: 250n });
  ok("alice sent 250 to bob");
  balances(mt, gold.tokenId);

  await sleep(DELAY_MS);

  // ─── Step 5: Transfer-call ──────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Transfer-call");

  settlement.receivers.register("shop", (n: TransferNotification) => {
    const sent = n.amounts[0] ?? 0n;
    const price = 70n;
    console.log(chalk.gray("    ⋯ ") + chalk.gray(`shop received "${n.message}", keeps ${price}`));
    return [formatAmount(sent > price ? sent - price : 0n)];
  });

  const receipt = settlement.transferCall(call("bob"), {
    receiverId: "shop",
    tokenId: gold.tokenId,
    amount: 100n,
    message: "one widget",
  });
  ok(`bob sent 100 to shop optimistically (settlement ${receipt.settlementId.slice(0, 8)})`);
  info("state", settlement.settlement(receipt.settlementId)?.state ?? "unknown");
  balances(mt, gold.tokenId);

  await sleep(DELAY_MS);

  // ─── Step 6: Notify + Resolve ───────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Notify and resolve");

  const ran = await scheduler.drain();
  const record = settlement.settlement(receipt.settlementId);
  ok(`${ran} scheduled calls ran`);
  info("state", record?.state ?? "unknown");
  info("settled", (record?.settled ?? []).map(formatAmount).join(", "));
  info("refunded", (record?.refunded ?? []).map(formatAmount).join(", "));
  balances(mt, gold.tokenId);

  await sleep(DELAY_MS);

  // ─── Step 7: Event log ──────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Event log");

  const allEvents = mt.eventStore.readAll();
  for (const se of allEvents) {
    const line = JSON.stringify({
      type: se.event.type,
      stream: se.streamId.length > 20 ? `${se.streamId.slice(0, 20)}...` : se.streamId,
      hash: se.hash.slice(0, 12) + "...",
    });
    console.log(chalk.gray("    ") + chalk.dim(line));
  }
  const integrity = mt.eventStore.verifyIntegrity();
  ok(`${allEvents.length} events, hash chain ${integrity.valid ? chalk.green.bold("VALID") : chalk.red.bold("BROKEN")}`);
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
