/**
 * Shared wire primitives. Integers that may exceed 2^53 travel as strings.
 */

import { Type } from "@sinclair/typebox";
import {
  HASH28_HEX_LENGTH,
  TOKEN_NAME_MAX_HEX_LENGTH,
  TX_HASH_HEX_LENGTH,
} from "../constants.js";

export const Hash28 = Type.String({ pattern: `^[0-9a-f]{${HASH28_HEX_LENGTH}}$` });
export const TxHash = Type.String({ pattern: `^[0-9a-f]{${TX_HASH_HEX_LENGTH}}$` });
export const TokenNameHex = Type.String({
  pattern: `^([0-9a-f]{2}){0,${TOKEN_NAME_MAX_HEX_LENGTH / 2}}$`,
});
export const HexBytes = Type.String({ pattern: "^([0-9a-f]{2})*$" });
export const IntString = Type.String({ pattern: "^-?(0|[1-9][0-9]*)$" });
/** Held quantities: never negative. */
export const QuantityString = Type.String({ pattern: "^(0|[1-9][0-9]*)$" });
