/**
 * Quantity aggregation across consumed inputs.
 * Total over every input's value; inputs without the asset add 0.
 */

import type { Input, PolicyId, TokenName } from "./types.js";
import { assetQuantity } from "./value.js";

export function quantityOf(
  inputs: readonly Input[],
  policyId: PolicyId,
  tokenName: TokenName,
): bigint {
  return inputs.reduce(
    (sum, input) => sum + assetQuantity(input.output.value, policyId, tokenName),
    0n,
  );
}
