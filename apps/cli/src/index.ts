#!/usr/bin/env node
/**
 * lpstake CLI — run the staking validator against transaction snapshots.
 *
 * Commands:
 *   spend <tx.json> --ref <tx_hash#index>   Spending validator (unstake)
 *   mint <tx.json> --redeemer <json>        Minting policy (Mint/Burn/DepositReward)
 *   reward <staked> <days>                  Reward due at the fixed annual rate
 *   config                                  Show resolved configuration
 *
 * Exit code 1 when the validator rejects or input cannot be read.
 */

import { Command } from "commander";
import { loadConfig } from "./lib/config.js";
import { spendCommand } from "./commands/spend.js";
import { mintCommand } from "./commands/mint.js";
import { rewardCommand } from "./commands/reward.js";
import { configCommand } from "./commands/config-cmd.js";

const program = new Command();

program
  .name("lpstake")
  .description("Offline checks for the LP staking validator")
  .version("0.1.0");

// ── spend ───────────────────────────────────────────────────────────

program
  .command("spend")
  .description("Check an unstake: may the script input at --ref be spent?")
  .argument("<tx>", "Transaction snapshot JSON file")
  .requiredOption("-r, --ref <out_ref>", "Own input, <tx_hash>#<index>")
  .option("-d, --datum <json>", "Own input's datum (inline JSON or @file)")
  .option("--now <seconds>", "Current POSIX time (default: validity upper bound)")
  .action(async (txPath: string, opts: { ref: string; datum?: string; now?: string }) => {
    const config = await loadConfig();
    const verdict = await spendCommand(txPath, config, opts);
    if (!verdict.ok) process.exitCode = 1;
  });

// ── mint ────────────────────────────────────────────────────────────

program
  .command("mint")
  .description("Check a mint/burn/deposit against the claimed redeemer")
  .argument("<tx>", "Transaction snapshot JSON file")
  .requiredOption("--redeemer <json>", "Redeemer data (inline JSON or @file)")
  .requiredOption("-p, --policy <hex>", "Policy id of the minting policy being run")
  .action(async (txPath: string, opts: { redeemer: string; policy: string }) => {
    const config = await loadConfig();
    const verdict = await mintCommand(txPath, config, opts);
    if (!verdict.ok) process.exitCode = 1;
  });

// ── reward ──────────────────────────────────────────────────────────

program
  .command("reward")
  .description("Reward owed for a stake held a number of whole days")
  .argument("<staked>", "Underlying tokens staked")
  .argument("<days>", "Whole days staked")
  .action((staked: string, days: string) => {
    rewardCommand(staked, days);
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show the resolved validator configuration")
  .action(async () => {
    configCommand(await loadConfig());
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
