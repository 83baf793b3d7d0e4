import { describe, it, expect } from "vitest";
import {
  BORROWER,
  deploy,
  LIQUIDATOR,
  openUnhealthyLoan,
  scenarioA,
  scenarioB,
  scenarioC,
  scenarioD,
} from "../src/scenarios.js";

function summary(steps: readonly { tick: bigint; outcome: string; detail: string }[]) {
  return steps.map((s) => [s.tick, s.outcome, s.detail]);
}

describe("openUnhealthyLoan", () => {
  it("pledges collateral and keeps the rest in the wallet", () => {
    const d = deploy();
    openUnhealthyLoan(d, 1000n, 600n);

    expect(d.token.balanceOf(BORROWER)).toBe(1000n);
    expect(d.underlying.balanceOf(BORROWER)).toBe(600n);
    expect(d.protocol.getUserCollateral(BORROWER)).toBe(1000n);
    expect(d.protocol.canLiquidate(BORROWER)).toBe(true);
  });
});

describe("scenario A", () => {
  it("ramps 10% to 100% across the window", () => {
    expect(summary(scenarioA().steps)).toEqual([
      [0n, "ok", "blockedUntil 10, windowEnd 15, snapshot 1000"],
      [10n, "ok", "10% = 100"],
      [12n, "ok", "46% = 460"],
      [15n, "ok", "100% = 1000"],
    ]);
  });
});

describe("scenario B", () => {
  it("starts at the base and ends uncapped", () => {
    expect(summary(scenarioB().steps)).toEqual([
      [0n, "ok", "blockedUntil 10, windowEnd 15, snapshot 1000"],
      [10n, "ok", "10% = 100"],
      [15n, "ok", "100% = 1000"],
    ]);
  });
});

describe("scenario C", () => {
  it("rejects the racing initiator until the window has lapsed", () => {
    expect(summary(scenarioC().steps)).toEqual([
      [0n, "ok", "blockedUntil 10, windowEnd 15, snapshot 1000"],
      [0n, "rejected", "ALREADY_INITIATED"],
      [12n, "rejected", "ALREADY_INITIATED"],
      [16n, "rejected", "WINDOW_EXPIRED"],
      [16n, "ok", "blockedUntil 26, windowEnd 31, snapshot 1000"],
    ]);
  });
});

describe("scenario D", () => {
  it("blocks the over-ceiling seizure and clears on the exact one", () => {
    expect(summary(scenarioD().steps)).toEqual([
      [0n, "ok", "blockedUntil 10, windowEnd 15, snapshot 1000"],
      [5n, "rejected", "IN_COOLDOWN"],
      [11n, "ok", "28% = 280"],
      [11n, "rejected", "EXCEEDS_LIMIT"],
      [11n, "ok", "28% = 280"],
      [11n, "ok", "collateral left 720"],
      [11n, "ok", "0% = 0"],
    ]);
  });

  it("labels liquidations by amount", () => {
    const actions = scenarioD().steps.map((s) => s.action);
    expect(actions).toContain("liquidate 280");
    expect(actions[0]).toBe("initiate (liquidator)");
    expect(LIQUIDATOR).toMatch(/^0x3{40}$/);
  });
});
