/**
 * TransactionSnapshotV1 — the frozen view of one transaction as JSON.
 *
 * Assets are entry lists; a repeated (policy_id, token_name) keeps its first
 * entry when decoded. Validity bounds are POSIX seconds; omit a bound to
 * leave it open.
 */

import { Type, type Static } from "@sinclair/typebox";
import { PlutusDataV1 } from "./data.js";
import { Hash28, IntString, QuantityString, TokenNameHex, TxHash } from "./primitives.js";

export const CredentialV1 = Type.Object(
  {
    type: Type.Union([Type.Literal("Key"), Type.Literal("Script")]),
    hash: Hash28,
  },
  { additionalProperties: false },
);

export type CredentialV1 = Static<typeof CredentialV1>;

export const AddressV1 = Type.Object(
  {
    payment: CredentialV1,
    stake: Type.Optional(CredentialV1),
  },
  { additionalProperties: false },
);

export type AddressV1 = Static<typeof AddressV1>;

export const OutRefV1 = Type.Object(
  {
    tx_hash: TxHash,
    output_index: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type OutRefV1 = Static<typeof OutRefV1>;

/** An asset held in an output. */
export const AssetV1 = Type.Object(
  {
    policy_id: Hash28,
    token_name: TokenNameHex,
    quantity: QuantityString,
  },
  { additionalProperties: false },
);

export type AssetV1 = Static<typeof AssetV1>;

/** A mint field entry: negative burns. */
export const MintAssetV1 = Type.Object(
  {
    policy_id: Hash28,
    token_name: TokenNameHex,
    quantity: IntString,
  },
  { additionalProperties: false },
);

export type MintAssetV1 = Static<typeof MintAssetV1>;

export const OutputV1 = Type.Object(
  {
    address: AddressV1,
    value: Type.Array(AssetV1),
    datum: Type.Optional(PlutusDataV1),
  },
  { additionalProperties: false },
);

export type OutputV1 = Static<typeof OutputV1>;

export const InputV1 = Type.Object(
  {
    out_ref: OutRefV1,
    output: OutputV1,
  },
  { additionalProperties: false },
);

export type InputV1 = Static<typeof InputV1>;

export const ValidityRangeV1 = Type.Object(
  {
    lower: Type.Optional(IntString),
    upper: Type.Optional(IntString),
  },
  { additionalProperties: false },
);

export type ValidityRangeV1 = Static<typeof ValidityRangeV1>;

export const TransactionSnapshotV1 = Type.Object(
  {
    version: Type.Literal(1),
    inputs: Type.Array(InputV1),
    outputs: Type.Array(OutputV1),
    mint: Type.Array(MintAssetV1),
    signers: Type.Array(Hash28),
    validity: ValidityRangeV1,
  },
  { additionalProperties: false },
);

export type TransactionSnapshotV1 = Static<typeof TransactionSnapshotV1>;
