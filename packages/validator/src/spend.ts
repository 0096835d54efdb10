/**
 * Spending validator: decides whether a staked UTxO may be released together
 * with its accrued reward.
 *
 * Steps:
 *   1. own input present among the inputs              (StructuralError)
 *   2. own input locked by a script credential         (StructuralError)
 *   3. LP minted under that script's policy obeys the
 *      configured SpendLpSignRule                      (RuleViolation)
 *   4. total underlying staked across inputs
 *   5. reward due for the staked duration              (DataError on a bad
 *                                                       record or open bound)
 *   6. reward tokens escrowed across inputs
 *   7. reward due <= reward escrowed                   (RuleViolation)
 */

import { evaluate, fail, REASONS, type Verdict } from "./errors.js";
import {
  findStakeStart,
  stakeStartFromDatum,
  stakingDurationDays,
  validityNow,
} from "./duration.js";
import { mintedAmount, mintedUnderPolicy } from "./minted.js";
import { quantityOf } from "./quantity.js";
import { computeReward } from "./reward.js";
import type {
  OutRef,
  PlutusData,
  PosixTime,
  SpendLpSignRule,
  TransactionSnapshot,
  ValidatorConfig,
} from "./types.js";

export interface SpendOptions {
  /** Datum of the input being spent. When set, it is the staking record. */
  datum?: PlutusData;
  /**
   * Current time. Defaults to the transaction's validity upper bound; when
   * set, the bound is not read, so an open upper bound is not rejected.
   */
  now?: PosixTime;
}

export function sameOutRef(a: OutRef, b: OutRef): boolean {
  return a.txHash === b.txHash && a.outputIndex === b.outputIndex;
}

export function checkSpendLpSign(rule: SpendLpSignRule, lpMinted: bigint): void {
  switch (rule) {
    case "non-negative":
      if (lpMinted < 0n) fail("RuleViolation", REASONS.unexpectedLpMint);
      return;
    case "negative":
      if (lpMinted >= 0n) fail("RuleViolation", REASONS.lpNotBurned);
      return;
  }
}

export function authorizeSpend(
  config: ValidatorConfig,
  ownRef: OutRef,
  tx: TransactionSnapshot,
  options: SpendOptions = {},
): Verdict {
  return evaluate(() => {
    const own = tx.inputs.find((i) => sameOutRef(i.outRef, ownRef));
    if (own === undefined) fail("StructuralError", REASONS.ownInputNotFound);

    const credential = own.output.address.payment;
    if (credential.type !== "Script") fail("StructuralError", REASONS.notScriptInput);

    // The script hash doubles as the LP minting policy id.
    const burnedLp = mintedAmount(mintedUnderPolicy(tx.mint, credential.hash), config.lpTokenName);
    checkSpendLpSign(config.spendLpSignRule, burnedLp);

    const totalStaked = quantityOf(
      tx.inputs,
      config.underlyingPolicyId,
      config.underlyingTokenName,
    );

    const start =
      options.datum !== undefined
        ? stakeStartFromDatum(options.datum)
        : findStakeStart(tx.inputs);
    const now = options.now ?? validityNow(tx.validity);
    const days = stakingDurationDays(start, now);
    if (days < 0n) fail("DataError", REASONS.negativeDuration);

    const rewardDue = computeReward(totalStaked, days);
    const rewardAvailable = quantityOf(tx.inputs, config.rewardPolicyId, config.rewardTokenName);

    if (rewardDue > rewardAvailable) fail("RuleViolation", REASONS.insufficientReward);
  });
}
