/**
 * @lpstake/validator — LP staking validation core.
 *
 * Pure rules only: no I/O, no clock, no state. Every decision is a function
 * of one transaction snapshot plus the deployment configuration.
 * Tooling imports from here, never the reverse.
 */

// Entry points
export {
  createValidator,
  DEFAULT_SPEND_LP_SIGN_RULE,
  type StakingValidator,
  type ValidatorParams,
} from "./validator.js";
export { authorizeSpend, checkSpendLpSign, sameOutRef, type SpendOptions } from "./spend.js";
export { authorizeMint } from "./mint.js";

// Redeemer actions
export { actionFromData, actionToData } from "./action.js";

// Pure helpers
export { quantityOf } from "./quantity.js";
export { mintedAmount, mintedUnderPolicy } from "./minted.js";
export {
  parseStakeDatum,
  stakeStartFromDatum,
  findStakeStart,
  validityNow,
  stakingDurationDays,
} from "./duration.js";
export { computeReward } from "./reward.js";
export {
  tokenMapFromEntries,
  valueFromAssets,
  valueToAssets,
  assetQuantity,
  type AssetEntry,
} from "./value.js";

// Verdicts
export {
  ValidationFailure,
  REASONS,
  evaluate,
  fail,
  type FailureKind,
  type Reason,
  type Verdict,
} from "./errors.js";

// Wire codec
export {
  SchemaError,
  decodeData,
  encodeData,
  decodeSnapshot,
  decodeConfig,
  encodeAssets,
  parseOutRef,
  formatOutRef,
} from "./codec.js";

// Ledger shapes
export type * from "./types.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
