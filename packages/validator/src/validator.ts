/**
 * Validator instance: configuration bound once, two entry points.
 *
 * The configuration is copied and frozen at creation. Both entry points are
 * pure: the same snapshot and arguments always give the same Verdict.
 */

import { actionFromData } from "./action.js";
import { REASONS, type Verdict } from "./errors.js";
import { authorizeMint } from "./mint.js";
import { authorizeSpend, type SpendOptions } from "./spend.js";
import type {
  OutRef,
  PlutusData,
  PolicyId,
  SpendLpSignRule,
  TransactionSnapshot,
  ValidatorConfig,
} from "./types.js";

export const DEFAULT_SPEND_LP_SIGN_RULE: SpendLpSignRule = "non-negative";

export type ValidatorParams = Omit<ValidatorConfig, "spendLpSignRule"> & {
  spendLpSignRule?: SpendLpSignRule;
};

export interface StakingValidator {
  readonly config: Readonly<ValidatorConfig>;
  /** Spend path: may the UTxO at `ownRef` be consumed by `tx`? */
  spend(ownRef: OutRef, tx: TransactionSnapshot, options?: SpendOptions): Verdict;
  /** Mint path: does the mint/burn under `policyId` match the redeemer? */
  mint(redeemer: PlutusData, policyId: PolicyId, tx: TransactionSnapshot): Verdict;
}

export function createValidator(params: ValidatorParams): StakingValidator {
  const config: Readonly<ValidatorConfig> = Object.freeze({
    underlyingPolicyId: params.underlyingPolicyId,
    underlyingTokenName: params.underlyingTokenName,
    lpTokenName: params.lpTokenName,
    rewardPolicyId: params.rewardPolicyId,
    rewardTokenName: params.rewardTokenName,
    adminKeyHash: params.adminKeyHash,
    spendLpSignRule: params.spendLpSignRule ?? DEFAULT_SPEND_LP_SIGN_RULE,
  });

  return {
    config,
    spend: (ownRef, tx, options) => authorizeSpend(config, ownRef, tx, options),
    mint: (redeemer, policyId, tx) => {
      const action = actionFromData(redeemer);
      if (action === undefined) {
        return { ok: false, kind: "UnknownAction", reason: REASONS.invalidAction };
      }
      return authorizeMint(config, action, policyId, tx);
    },
  };
}
