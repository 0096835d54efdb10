/**
 * Key-unique asset maps.
 *
 * Wire forms carry assets as ordered entry lists. Building a map from one
 * keeps the FIRST entry for a repeated (policy, name) key and ignores the
 * rest, so a list with duplicates always yields the same single quantity.
 * Zero quantities are not stored.
 */

import type { PolicyId, TokenMap, TokenName, Value } from "./types.js";

export interface AssetEntry {
  policyId: PolicyId;
  tokenName: TokenName;
  quantity: bigint;
}

/** Build a TokenMap from (name, quantity) pairs. First entry per name wins. */
export function tokenMapFromEntries(
  entries: Iterable<readonly [TokenName, bigint]>,
): TokenMap {
  const seen = new Set<TokenName>();
  const map = new Map<TokenName, bigint>();
  for (const [name, quantity] of entries) {
    if (seen.has(name)) continue;
    seen.add(name);
    if (quantity !== 0n) map.set(name, quantity);
  }
  return map;
}

/** Build a Value from asset entries. First entry per (policy, name) wins. */
export function valueFromAssets(assets: Iterable<AssetEntry>): Value {
  const byPolicy = new Map<PolicyId, [TokenName, bigint][]>();
  for (const a of assets) {
    const list = byPolicy.get(a.policyId) ?? [];
    list.push([a.tokenName, a.quantity]);
    byPolicy.set(a.policyId, list);
  }

  const value = new Map<PolicyId, TokenMap>();
  for (const [policyId, entries] of byPolicy) {
    const tokens = tokenMapFromEntries(entries);
    if (tokens.size > 0) value.set(policyId, tokens);
  }
  return value;
}

/** Quantity of one asset in a value; 0 when absent. */
export function assetQuantity(
  value: Value,
  policyId: PolicyId,
  tokenName: TokenName,
): bigint {
  return value.get(policyId)?.get(tokenName) ?? 0n;
}

/** Flatten a value back into entries, policy then name in insertion order. */
export function valueToAssets(value: Value): AssetEntry[] {
  const out: AssetEntry[] = [];
  for (const [policyId, tokens] of value) {
    for (const [tokenName, quantity] of tokens) {
      out.push({ policyId, tokenName, quantity });
    }
  }
  return out;
}
