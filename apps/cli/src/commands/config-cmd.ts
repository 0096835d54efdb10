/**
 * lpstake config — show the resolved validator configuration.
 */

import { createValidator } from "@lpstake/validator";
import type { CliConfig } from "../lib/config.js";

export function configCommand(config: CliConfig): void {
  const { config: resolved } = createValidator(config.validator);

  console.log(`Config file: ${config.configPath}\n`);
  console.log(`  underlying:  ${resolved.underlyingPolicyId}.${resolved.underlyingTokenName}`);
  console.log(`  lp token:    ${resolved.lpTokenName}`);
  console.log(`  reward:      ${resolved.rewardPolicyId}.${resolved.rewardTokenName}`);
  console.log(`  admin:       ${resolved.adminKeyHash}`);
  console.log(`  spend LP:    ${resolved.spendLpSignRule}`);
}
