/**
 * JSON wire codec: V1 schemas ⇄ in-memory ledger shapes.
 *
 * Decoding checks the input against its TypeBox schema first. A shape error
 * is a SchemaError (a malformed file), not a validator rejection.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { PlutusDataV1 } from "./schemas/data.js";
import { ValidatorConfigV1 } from "./schemas/config.js";
import {
  TransactionSnapshotV1,
  type AssetV1,
  type MintAssetV1,
  type CredentialV1,
  type OutputV1,
} from "./schemas/transaction.js";
import type {
  Value as AssetValue,
  Credential,
  Output,
  OutRef,
  PlutusData,
  TransactionSnapshot,
} from "./types.js";
import type { ValidatorParams } from "./validator.js";
import { valueFromAssets, valueToAssets } from "./value.js";

export class SchemaError extends Error {
  readonly issues: readonly string[];

  constructor(what: string, issues: readonly string[]) {
    super(`invalid ${what}: ${issues.join("; ")}`);
    this.name = "SchemaError";
    this.issues = issues;
  }
}

function check<T extends TSchema>(schema: T, what: string, raw: unknown): Static<T> {
  if (Value.Check(schema, raw)) return raw;
  const issues = [...Value.Errors(schema, raw)].map(
    (e) => `${e.path === "" ? "/" : e.path} ${e.message}`,
  );
  throw new SchemaError(what, issues);
}

// ── PlutusData ─────────────────────────────────────────────────────

function dataFromWire(d: PlutusDataV1): PlutusData {
  if ("int" in d) return { int: BigInt(d.int) };
  if ("bytes" in d) return { bytes: d.bytes };
  if ("constr" in d) return { constr: d.constr, fields: d.fields.map(dataFromWire) };
  if ("list" in d) return { list: d.list.map(dataFromWire) };
  return { map: d.map.map(({ k, v }) => ({ k: dataFromWire(k), v: dataFromWire(v) })) };
}

export function decodeData(raw: unknown): PlutusData {
  return dataFromWire(check(PlutusDataV1, "plutus data", raw));
}

export function encodeData(d: PlutusData): PlutusDataV1 {
  if ("int" in d) return { int: d.int.toString() };
  if ("bytes" in d) return { bytes: d.bytes };
  if ("constr" in d) return { constr: d.constr, fields: d.fields.map(encodeData) };
  if ("list" in d) return { list: d.list.map(encodeData) };
  return { map: d.map.map(({ k, v }) => ({ k: encodeData(k), v: encodeData(v) })) };
}

// ── Transaction snapshot ───────────────────────────────────────────

function credentialFromWire(c: CredentialV1): Credential {
  return c.type === "Script" ? { type: "Script", hash: c.hash } : { type: "Key", hash: c.hash };
}

function valueFromWire(assets: readonly (AssetV1 | MintAssetV1)[]): AssetValue {
  return valueFromAssets(
    assets.map((a) => ({
      policyId: a.policy_id,
      tokenName: a.token_name,
      quantity: BigInt(a.quantity),
    })),
  );
}

function outputFromWire(o: OutputV1): Output {
  const output: Output = {
    address: {
      payment: credentialFromWire(o.address.payment),
      ...(o.address.stake ? { stake: credentialFromWire(o.address.stake) } : {}),
    },
    value: valueFromWire(o.value),
  };
  if (o.datum !== undefined) output.datum = dataFromWire(o.datum);
  return output;
}

export function decodeSnapshot(raw: unknown): TransactionSnapshot {
  const tx = check(TransactionSnapshotV1, "transaction snapshot", raw);
  return {
    inputs: tx.inputs.map((i) => ({
      outRef: { txHash: i.out_ref.tx_hash, outputIndex: i.out_ref.output_index },
      output: outputFromWire(i.output),
    })),
    outputs: tx.outputs.map(outputFromWire),
    mint: valueFromWire(tx.mint),
    signers: new Set(tx.signers),
    validity: {
      ...(tx.validity.lower !== undefined ? { lower: BigInt(tx.validity.lower) } : {}),
      ...(tx.validity.upper !== undefined ? { upper: BigInt(tx.validity.upper) } : {}),
    },
  };
}

/** A value or mint field back to wire entries. */
export function encodeAssets(value: AssetValue): MintAssetV1[] {
  return valueToAssets(value).map((a) => ({
    policy_id: a.policyId,
    token_name: a.tokenName,
    quantity: a.quantity.toString(),
  }));
}

// ── Config ─────────────────────────────────────────────────────────

export function decodeConfig(raw: unknown): ValidatorParams {
  const c = check(ValidatorConfigV1, "validator config", raw);
  return {
    underlyingPolicyId: c.underlying_policy_id,
    underlyingTokenName: c.underlying_token_name,
    lpTokenName: c.lp_token_name,
    rewardPolicyId: c.reward_policy_id,
    rewardTokenName: c.reward_token_name,
    adminKeyHash: c.admin_key_hash,
    ...(c.spend_lp_sign_rule ? { spendLpSignRule: c.spend_lp_sign_rule } : {}),
  };
}

// ── Out refs ───────────────────────────────────────────────────────

const OUT_REF_RE = /^([0-9a-f]{64})#(0|[1-9][0-9]*)$/;

/** Parse "<tx_hash>#<index>". */
export function parseOutRef(s: string): OutRef {
  const m = OUT_REF_RE.exec(s);
  if (!m || m[1] === undefined || m[2] === undefined) {
    throw new SchemaError("out ref", [`expected <tx_hash>#<index>, got ${s}`]);
  }
  return { txHash: m[1], outputIndex: parseInt(m[2], 10) };
}

export function formatOutRef(ref: OutRef): string {
  return `${ref.txHash}#${ref.outputIndex}`;
}
