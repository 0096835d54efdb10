/**
 * PlutusDataV1 — datums and redeemers as JSON.
 *
 *   { "int": "42" }
 *   { "bytes": "cafe" }
 *   { "constr": 0, "fields": [ ... ] }
 *   { "list": [ ... ] }
 *   { "map": [ { "k": ..., "v": ... } ] }
 */

import { Type, type Static } from "@sinclair/typebox";
import { HexBytes, IntString } from "./primitives.js";

export const PlutusDataV1 = Type.Recursive(
  (This) =>
    Type.Union([
      Type.Object({ int: IntString }, { additionalProperties: false }),
      Type.Object({ bytes: HexBytes }, { additionalProperties: false }),
      Type.Object(
        {
          constr: Type.Integer({ minimum: 0 }),
          fields: Type.Array(This),
        },
        { additionalProperties: false },
      ),
      Type.Object({ list: Type.Array(This) }, { additionalProperties: false }),
      Type.Object(
        {
          map: Type.Array(Type.Object({ k: This, v: This }, { additionalProperties: false })),
        },
        { additionalProperties: false },
      ),
    ]),
  { $id: "PlutusDataV1" },
);

export type PlutusDataV1 = Static<typeof PlutusDataV1>;
