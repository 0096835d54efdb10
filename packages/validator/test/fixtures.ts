/**
 * Shared builders for validator test vectors.
 */

import { createValidator } from "../src/validator.js";
import { valueFromAssets, type AssetEntry } from "../src/value.js";
import type {
  Credential,
  Input,
  PlutusData,
  TransactionSnapshot,
  ValidatorConfig,
  ValidityRange,
} from "../src/types.js";

export const UNDERLYING_POLICY = "11".repeat(28);
export const REWARD_POLICY = "22".repeat(28);
export const SCRIPT_HASH = "33".repeat(28); // spend script == LP minting policy
export const ADMIN_KEY = "44".repeat(28);
export const USER_KEY = "55".repeat(28);
export const OTHER_POLICY = "66".repeat(28);

export const UNDERLYING_NAME = "7374616b65"; // "stake"
export const LP_NAME = "6c70"; // "lp"
export const REWARD_NAME = "726577"; // "rew"

export const DAY = 86_400n;
export const START = 1_700_000_000n;

export const BASE_CONFIG: ValidatorConfig = {
  underlyingPolicyId: UNDERLYING_POLICY,
  underlyingTokenName: UNDERLYING_NAME,
  lpTokenName: LP_NAME,
  rewardPolicyId: REWARD_POLICY,
  rewardTokenName: REWARD_NAME,
  adminKeyHash: ADMIN_KEY,
  spendLpSignRule: "non-negative",
};

export const validator = createValidator(BASE_CONFIG);

export const SCRIPT: Credential = { type: "Script", hash: SCRIPT_HASH };
export const WALLET: Credential = { type: "Key", hash: USER_KEY };

export function txHash(n: number): string {
  return n.toString(16).padStart(2, "0").repeat(32);
}

export function underlying(quantity: bigint): AssetEntry {
  return { policyId: UNDERLYING_POLICY, tokenName: UNDERLYING_NAME, quantity };
}

export function reward(quantity: bigint): AssetEntry {
  return { policyId: REWARD_POLICY, tokenName: REWARD_NAME, quantity };
}

export function lp(quantity: bigint): AssetEntry {
  return { policyId: SCRIPT_HASH, tokenName: LP_NAME, quantity };
}

export function stakeDatum(start: bigint): PlutusData {
  return { constr: 0, fields: [{ int: start }] };
}

export function input(
  n: number,
  assets: AssetEntry[],
  opts: { payment?: Credential; datum?: PlutusData } = {},
): Input {
  return {
    outRef: { txHash: txHash(n), outputIndex: 0 },
    output: {
      address: { payment: opts.payment ?? WALLET },
      value: valueFromAssets(assets),
      ...(opts.datum !== undefined ? { datum: opts.datum } : {}),
    },
  };
}

export function tx(parts: {
  inputs?: Input[];
  mint?: AssetEntry[];
  signers?: string[];
  validity?: ValidityRange;
}): TransactionSnapshot {
  return {
    inputs: parts.inputs ?? [],
    outputs: [],
    mint: valueFromAssets(parts.mint ?? []),
    signers: new Set(parts.signers ?? []),
    validity: parts.validity ?? {},
  };
}
