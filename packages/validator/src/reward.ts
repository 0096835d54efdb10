/**
 * Reward accrual.
 *
 * reward = floor(staked × days × rate% / (365 × 100))
 *
 * Integer arithmetic only. A negative duration earns nothing: the result is
 * clamped to 0 here, and the spend path rejects negative durations before
 * ever getting this far.
 */

import { ANNUAL_REWARD_RATE_PERCENT, DAYS_PER_YEAR } from "./constants.js";

export function computeReward(
  totalStaked: bigint,
  durationDays: bigint,
  annualRatePercent: bigint = ANNUAL_REWARD_RATE_PERCENT,
): bigint {
  if (durationDays <= 0n || totalStaked <= 0n) return 0n;
  return (totalStaked * durationDays * annualRatePercent) / (DAYS_PER_YEAR * 100n);
}
