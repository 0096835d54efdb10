/**
 * lpstake spend <tx.json> --ref <tx_hash#index>
 *
 * Run the spending validator against a transaction snapshot file.
 */

import {
  createValidator,
  decodeData,
  decodeSnapshot,
  formatOutRef,
  parseOutRef,
  type SpendOptions,
  type Verdict,
} from "@lpstake/validator";
import type { CliConfig } from "../lib/config.js";
import { readJsonArg, readJsonFile } from "../lib/json.js";
import { formatVerdict } from "../lib/output.js";

export interface SpendCommandOptions {
  ref: string;
  /** Own input's datum: inline JSON or @file. */
  datum?: string;
  /** POSIX seconds; overrides the validity upper bound. */
  now?: string;
}

export async function spendCommand(
  txPath: string,
  config: CliConfig,
  opts: SpendCommandOptions,
): Promise<Verdict> {
  const ownRef = parseOutRef(opts.ref);
  const tx = decodeSnapshot(await readJsonFile(txPath));

  const options: SpendOptions = {};
  if (opts.datum !== undefined) options.datum = decodeData(await readJsonArg(opts.datum));
  if (opts.now !== undefined) {
    if (!/^-?[0-9]+$/.test(opts.now)) throw new Error(`--now must be an integer. Got: ${opts.now}`);
    options.now = BigInt(opts.now);
  }

  const validator = createValidator(config.validator);
  console.log(`[spend] ${formatOutRef(ownRef)} (${tx.inputs.length} inputs)`);
  const verdict = validator.spend(ownRef, tx, options);
  console.log(formatVerdict(verdict));
  return verdict;
}
