/**
 * Minting policy: decides whether the LP mint/burn in a transaction matches
 * the action the submitter claims.
 *
 *   Mint(n)        underlying staked across inputs == n AND LP minted == n
 *   Burn           LP minted < 0
 *   DepositReward  admin key hash among the signers
 */

import { evaluate, fail, REASONS, type Verdict } from "./errors.js";
import { mintedAmount, mintedUnderPolicy } from "./minted.js";
import { quantityOf } from "./quantity.js";
import type { Action, PolicyId, TransactionSnapshot, ValidatorConfig } from "./types.js";

export function authorizeMint(
  config: ValidatorConfig,
  action: Action,
  policyId: PolicyId,
  tx: TransactionSnapshot,
): Verdict {
  return evaluate(() => {
    const mintedLp = mintedAmount(mintedUnderPolicy(tx.mint, policyId), config.lpTokenName);

    switch (action.type) {
      case "Mint": {
        const totalStaked = quantityOf(
          tx.inputs,
          config.underlyingPolicyId,
          config.underlyingTokenName,
        );
        if (totalStaked !== action.amount || mintedLp !== action.amount) {
          fail("RuleViolation", REASONS.stakeMintMismatch);
        }
        return;
      }
      case "Burn":
        if (mintedLp >= 0n) fail("RuleViolation", REASONS.burnNotNegative);
        return;
      case "DepositReward":
        if (!tx.signers.has(config.adminKeyHash)) {
          fail("AuthorizationError", REASONS.adminSignatureMissing);
        }
        return;
      default:
        // only reachable with an action that bypassed actionFromData
        fail("UnknownAction", REASONS.invalidAction);
    }
  });
}
