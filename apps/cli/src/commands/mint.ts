/**
 * lpstake mint <tx.json> --redeemer <json|@file> --policy <hex>
 *
 * Run the minting policy against a transaction snapshot file.
 */

import {
  Hash28,
  createValidator,
  decodeData,
  decodeSnapshot,
  type Verdict,
} from "@lpstake/validator";
import { Value } from "@sinclair/typebox/value";
import type { CliConfig } from "../lib/config.js";
import { readJsonArg, readJsonFile } from "../lib/json.js";
import { formatVerdict } from "../lib/output.js";

export interface MintCommandOptions {
  redeemer: string;
  policy: string;
}

export async function mintCommand(
  txPath: string,
  config: CliConfig,
  opts: MintCommandOptions,
): Promise<Verdict> {
  if (!Value.Check(Hash28, opts.policy)) {
    throw new Error(`Invalid policy id: must be 56-char hex. Got: ${opts.policy}`);
  }

  const redeemer = decodeData(await readJsonArg(opts.redeemer));
  const tx = decodeSnapshot(await readJsonFile(txPath));

  const validator = createValidator(config.validator);
  console.log(`[mint] policy ${opts.policy.slice(0, 12)}... (${tx.mint.size} policies in mint)`);
  const verdict = validator.mint(redeemer, opts.policy, tx);
  console.log(formatVerdict(verdict));
  return verdict;
}
