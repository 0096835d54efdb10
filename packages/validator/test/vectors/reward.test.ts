/**
 * Test vectors — reward accrual at 8% per year, integer floor.
 */

import { describe, it, expect } from "vitest";
import { computeReward } from "../../src/reward.js";

describe("computeReward", () => {
  it("1000 staked for 30 days → floor(240000 / 36500) = 6", () => {
    expect(computeReward(1000n, 30n)).toBe(6n);
  });

  it("a full year pays the annual rate exactly", () => {
    expect(computeReward(1000n, 365n)).toBe(80n);
  });

  it("floors rather than rounds", () => {
    // 100 × 45 × 8 / 36500 = 0.986...
    expect(computeReward(100n, 45n)).toBe(0n);
    // 100 × 46 × 8 / 36500 = 1.008...
    expect(computeReward(100n, 46n)).toBe(1n);
  });

  it("zero duration → zero reward", () => {
    expect(computeReward(1000n, 0n)).toBe(0n);
  });

  it("negative duration clamps to zero", () => {
    expect(computeReward(1000n, -30n)).toBe(0n);
  });

  it("nothing staked → zero reward", () => {
    expect(computeReward(0n, 30n)).toBe(0n);
  });

  it("stays exact beyond 2^53", () => {
    const staked = 10n ** 20n;
    expect(computeReward(staked, 365n)).toBe(8n * 10n ** 18n);
  });

  it("rate can be overridden", () => {
    expect(computeReward(36500n, 1n, 100n)).toBe(100n);
  });
});
