/**
 * Redeemer actions for the minting policy.
 *
 *   Mint(n)        Constr 0 [Int n]
 *   Burn           Constr 1 []
 *   DepositReward  Constr 2 []
 */

import {
  ACTION_BURN_CONSTRUCTOR,
  ACTION_DEPOSIT_REWARD_CONSTRUCTOR,
  ACTION_MINT_CONSTRUCTOR,
} from "./constants.js";
import type { Action, PlutusData } from "./types.js";

/** Decode a redeemer. Returns undefined for anything that is not an Action. */
export function actionFromData(data: PlutusData): Action | undefined {
  if (!("constr" in data)) return undefined;
  const { constr, fields } = data;

  if (constr === ACTION_MINT_CONSTRUCTOR) {
    const [amount] = fields;
    if (fields.length !== 1 || amount === undefined || !("int" in amount)) {
      return undefined;
    }
    return { type: "Mint", amount: amount.int };
  }
  if (fields.length !== 0) return undefined;
  if (constr === ACTION_BURN_CONSTRUCTOR) return { type: "Burn" };
  if (constr === ACTION_DEPOSIT_REWARD_CONSTRUCTOR) return { type: "DepositReward" };
  return undefined;
}

export function actionToData(action: Action): PlutusData {
  switch (action.type) {
    case "Mint":
      return { constr: ACTION_MINT_CONSTRUCTOR, fields: [{ int: action.amount }] };
    case "Burn":
      return { constr: ACTION_BURN_CONSTRUCTOR, fields: [] };
    case "DepositReward":
      return { constr: ACTION_DEPOSIT_REWARD_CONSTRUCTOR, fields: [] };
  }
}
