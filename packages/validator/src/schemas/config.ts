/**
 * ValidatorConfigV1 — deployment parameters, fixed when the script is built.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Hash28, TokenNameHex } from "./primitives.js";

export const SpendLpSignRuleV1 = Type.Union([
  Type.Literal("non-negative"),
  Type.Literal("negative"),
]);

export type SpendLpSignRuleV1 = Static<typeof SpendLpSignRuleV1>;

export const ValidatorConfigV1 = Type.Object(
  {
    version: Type.Literal(1),
    underlying_policy_id: Hash28,
    underlying_token_name: TokenNameHex,
    lp_token_name: TokenNameHex,
    reward_policy_id: Hash28,
    reward_token_name: TokenNameHex,
    admin_key_hash: Hash28,
    spend_lp_sign_rule: Type.Optional(SpendLpSignRuleV1),
  },
  { additionalProperties: false },
);

export type ValidatorConfigV1 = Static<typeof ValidatorConfigV1>;
