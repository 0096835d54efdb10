/**
 * lpstake reward <staked> <days>
 */

import { computeReward } from "@lpstake/validator";

const NON_NEGATIVE_INT = /^(0|[1-9][0-9]*)$/;

export function rewardCommand(staked: string, days: string): bigint {
  if (!NON_NEGATIVE_INT.test(staked)) throw new Error(`Invalid staked amount: ${staked}`);
  if (!NON_NEGATIVE_INT.test(days)) throw new Error(`Invalid duration: ${days}`);

  const due = computeReward(BigInt(staked), BigInt(days));
  console.log(`${due}`);
  return due;
}
