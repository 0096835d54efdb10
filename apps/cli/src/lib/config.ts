/**
 * CLI configuration — validator deployment parameters.
 *
 * Loads ~/.lpstake/config.json (or $LPSTAKE_CONFIG) and applies env
 * overrides on top. Priority: env vars > config file.
 * The merged result is checked against ValidatorConfigV1.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { decodeConfig, type ValidatorParams } from "@lpstake/validator";

export interface CliConfig {
  /** File the parameters were read from (may not exist). */
  configPath: string;
  validator: ValidatorParams;
}

const DEFAULT_CONFIG_FILE = join(homedir(), ".lpstake", "config.json");

/** Wire field → env var that overrides it. */
const ENV_OVERRIDES = {
  underlying_policy_id: "LPSTAKE_UNDERLYING_POLICY",
  underlying_token_name: "LPSTAKE_UNDERLYING_TOKEN",
  lp_token_name: "LPSTAKE_LP_TOKEN",
  reward_policy_id: "LPSTAKE_REWARD_POLICY",
  reward_token_name: "LPSTAKE_REWARD_TOKEN",
  admin_key_hash: "LPSTAKE_ADMIN_KEY_HASH",
  spend_lp_sign_rule: "LPSTAKE_SPEND_LP_SIGN_RULE",
} as const;

const REQUIRED = [
  "underlying_policy_id",
  "underlying_token_name",
  "lp_token_name",
  "reward_policy_id",
  "reward_token_name",
  "admin_key_hash",
] as const;

type Env = Record<string, string | undefined>;

export function getConfigPath(env: Env = process.env): string {
  return env["LPSTAKE_CONFIG"] ?? DEFAULT_CONFIG_FILE;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file ${path} must hold a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/** Load config, merging env overrides on top. */
export async function loadConfig(env: Env = process.env): Promise<CliConfig> {
  const configPath = getConfigPath(env);
  const merged: Record<string, unknown> = { version: 1, ...(await readConfigFile(configPath)) };

  for (const [field, envKey] of Object.entries(ENV_OVERRIDES)) {
    const val = env[envKey];
    if (val !== undefined && val !== "") merged[field] = val;
  }

  for (const field of REQUIRED) {
    if (merged[field] === undefined) {
      throw new Error(
        `Missing config: ${field} (set ${ENV_OVERRIDES[field]} or add it to ${configPath})`,
      );
    }
  }

  return { configPath, validator: decodeConfig(merged) };
}
