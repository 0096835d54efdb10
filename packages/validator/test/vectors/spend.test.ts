/**
 * Test vectors — spending validator (unstake + reward release).
 *
 * Baseline: 1000 underlying staked at START, validity upper bound 30 days
 * later → reward due = floor(1000 × 30 × 8 / 36500) = 6.
 */

import { describe, it, expect } from "vitest";
import { authorizeSpend } from "../../src/spend.js";
import { createValidator } from "../../src/validator.js";
import type { AssetEntry } from "../../src/value.js";
import type { Input, OutRef } from "../../src/types.js";
import {
  BASE_CONFIG,
  DAY,
  SCRIPT,
  START,
  input,
  lp,
  reward,
  stakeDatum,
  tx,
  underlying,
  validator,
} from "../fixtures.js";

const OWN = input(1, [underlying(1000n)], { payment: SCRIPT, datum: stakeDatum(START) });
const OWN_REF: OutRef = OWN.outRef;
const UPPER = START + 30n * DAY;

function escrow(quantity: bigint): Input {
  return input(2, [reward(quantity)], { payment: SCRIPT });
}

function unstake(
  escrowed: bigint,
  opts: { mint?: AssetEntry[]; upper?: bigint | null; own?: Input } = {},
) {
  return tx({
    inputs: [opts.own ?? OWN, escrow(escrowed)],
    mint: opts.mint ?? [],
    validity: opts.upper === null ? { lower: START } : { lower: START, upper: opts.upper ?? UPPER },
  });
}

describe("reward release", () => {
  it("accepts when escrowed reward covers the 6 due", () => {
    expect(validator.spend(OWN_REF, unstake(6n))).toEqual({ ok: true });
  });

  it("accepts with more escrowed than due", () => {
    expect(validator.spend(OWN_REF, unstake(1_000n))).toEqual({ ok: true });
  });

  it("rejects at 5 escrowed", () => {
    expect(validator.spend(OWN_REF, unstake(5n))).toEqual({
      ok: false,
      kind: "RuleViolation",
      reason: "insufficient escrowed reward",
    });
  });

  it("reward tokens on the own input count toward escrow", () => {
    const own = input(1, [underlying(1000n), reward(6n)], {
      payment: SCRIPT,
      datum: stakeDatum(START),
    });
    expect(validator.spend(OWN_REF, unstake(0n, { own }))).toEqual({ ok: true });
  });

  it("stake under a day old owes nothing", () => {
    expect(validator.spend(OWN_REF, unstake(0n, { upper: START + DAY - 1n }))).toEqual({
      ok: true,
    });
  });
});

describe("structural checks", () => {
  it("own input missing → StructuralError", () => {
    const missing: OutRef = { txHash: "ab".repeat(32), outputIndex: 0 };
    expect(validator.spend(missing, unstake(6n))).toEqual({
      ok: false,
      kind: "StructuralError",
      reason: "own input not found",
    });
  });

  it("matches on output index too", () => {
    const sameTxOtherIndex: OutRef = { txHash: OWN_REF.txHash, outputIndex: 1 };
    expect(validator.spend(sameTxOtherIndex, unstake(6n)).ok).toBe(false);
  });

  it("own input at a key address → StructuralError", () => {
    const own = input(1, [underlying(1000n)], { datum: stakeDatum(START) });
    expect(validator.spend(OWN_REF, unstake(6n, { own }))).toEqual({
      ok: false,
      kind: "StructuralError",
      reason: "not a script input",
    });
  });
});

describe("LP sign rule on spend", () => {
  // Observed behaviour: the spend side demands burned_lp_amt >= 0, the mint
  // side's Burn demands < 0. A real unstake that burns LP is rejected here.
  it("non-negative (default): no LP movement is accepted", () => {
    expect(validator.config.spendLpSignRule).toBe("non-negative");
    expect(validator.spend(OWN_REF, unstake(6n, { mint: [lp(0n)] }))).toEqual({ ok: true });
  });

  it("non-negative (default): positive LP amount is accepted", () => {
    expect(validator.spend(OWN_REF, unstake(6n, { mint: [lp(1000n)] }))).toEqual({ ok: true });
  });

  it("non-negative (default): burning LP is rejected", () => {
    expect(validator.spend(OWN_REF, unstake(6n, { mint: [lp(-1000n)] }))).toEqual({
      ok: false,
      kind: "RuleViolation",
      reason: "unexpected LP mint during spend",
    });
  });

  it("negative: burning LP is accepted", () => {
    const strict = createValidator({ ...BASE_CONFIG, spendLpSignRule: "negative" });
    expect(strict.spend(OWN_REF, unstake(6n, { mint: [lp(-1000n)] }))).toEqual({ ok: true });
  });

  it("negative: no LP movement is rejected", () => {
    const strict = createValidator({ ...BASE_CONFIG, spendLpSignRule: "negative" });
    expect(strict.spend(OWN_REF, unstake(6n))).toEqual({
      ok: false,
      kind: "RuleViolation",
      reason: "LP not burned during spend",
    });
  });
});

describe("staking record and time", () => {
  it("open validity upper bound → DataError", () => {
    expect(validator.spend(OWN_REF, unstake(1_000n, { upper: null }))).toEqual({
      ok: false,
      kind: "DataError",
      reason: "validity interval has no upper bound",
    });
  });

  it("no datum on any input → DataError", () => {
    const own = input(1, [underlying(1000n)], { payment: SCRIPT });
    expect(validator.spend(OWN_REF, unstake(1_000n, { own }))).toEqual({
      ok: false,
      kind: "DataError",
      reason: "no staking record",
    });
  });

  it("malformed datum → DataError", () => {
    const own = input(1, [underlying(1000n)], { payment: SCRIPT, datum: { bytes: "00" } });
    expect(validator.spend(OWN_REF, unstake(1_000n, { own }))).toEqual({
      ok: false,
      kind: "DataError",
      reason: "malformed staking record",
    });
  });

  it("start after the upper bound → DataError", () => {
    expect(validator.spend(OWN_REF, unstake(1_000n, { upper: START - 1n }))).toEqual({
      ok: false,
      kind: "DataError",
      reason: "negative staking duration",
    });
  });

  it("injected now replaces the validity bound", () => {
    // 60 days → floor(1000 × 60 × 8 / 36500) = 13
    const now = START + 60n * DAY;
    expect(validator.spend(OWN_REF, unstake(12n), { now }).ok).toBe(false);
    expect(validator.spend(OWN_REF, unstake(13n), { now })).toEqual({ ok: true });
  });

  it("injected now waives the open upper bound check", () => {
    const now = START + 30n * DAY;
    expect(validator.spend(OWN_REF, unstake(6n, { upper: null }), { now })).toEqual({ ok: true });
  });

  it("explicit datum takes precedence over input datums", () => {
    // started 365 days before the bound → 80 due
    const datum = stakeDatum(UPPER - 365n * DAY);
    expect(validator.spend(OWN_REF, unstake(79n), { datum }).ok).toBe(false);
    expect(validator.spend(OWN_REF, unstake(80n), { datum })).toEqual({ ok: true });
  });

  it("explicit malformed datum → DataError", () => {
    expect(validator.spend(OWN_REF, unstake(6n), { datum: { int: START } })).toEqual({
      ok: false,
      kind: "DataError",
      reason: "malformed staking record",
    });
  });
});

describe("purity", () => {
  it("same snapshot and arguments → identical verdicts", () => {
    const snapshot = unstake(5n);
    expect(validator.spend(OWN_REF, snapshot)).toEqual(validator.spend(OWN_REF, snapshot));
    expect(authorizeSpend(BASE_CONFIG, OWN_REF, snapshot)).toEqual(
      authorizeSpend(BASE_CONFIG, OWN_REF, snapshot),
    );
  });

  it("config is frozen at creation", () => {
    const params = { ...BASE_CONFIG };
    const v = createValidator(params);
    params.rewardTokenName = "ff";
    expect(v.config.rewardTokenName).toBe(BASE_CONFIG.rewardTokenName);
    expect(Object.isFrozen(v.config)).toBe(true);
  });
});
