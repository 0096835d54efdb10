/**
 * Signed minted/burned quantities from the transaction's mint field.
 * Positive = minted, negative = burned, 0 = untouched.
 */

import type { PolicyId, TokenMap, TokenName, Value } from "./types.js";

const NO_TOKENS: TokenMap = new Map();

/** The TokenName → quantity map minted under one policy (empty if none). */
export function mintedUnderPolicy(mint: Value, policyId: PolicyId): TokenMap {
  return mint.get(policyId) ?? NO_TOKENS;
}

/** Signed quantity for `tokenName`; 0 when the name was not minted or burned. */
export function mintedAmount(tokens: TokenMap, tokenName: TokenName): bigint {
  return tokens.get(tokenName) ?? 0n;
}
