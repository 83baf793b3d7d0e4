/**
 * End-to-end tests for CircuitBreakerToken: the four reference scenarios,
 * guard rejections, atomicity and event emission.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryEventStore, BREAKER_EVENTS } from "@breakwater/event-store";
import { LedgerError } from "@breakwater/ledger";
import { CircuitBreakerToken } from "../src/circuit-breaker-token.js";
import { TickClock } from "../src/tick-clock.js";
import { BreakerError } from "../src/types.js";
import { walletCap } from "../src/progressive-calculator.js";
import { ALICE, BOB, LIQUIDATOR, TOKEN, StubTarget, createFixture, fundAndWrap } from "./helpers.js";
import type { Fixture } from "./helpers.js";

function expectBreakerError(fn: () => void, code: BreakerError["code"]): BreakerError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(BreakerError);
    if (err instanceof BreakerError) {
      expect(err.code).toBe(code);
      return err;
    }
  }
  throw new Error(`expected BreakerError ${code}`);
}

describe("CircuitBreakerToken", () => {
  let fx: Fixture;

  beforeEach(() => {
    fx = createFixture();
  });

  // ─── Scenario A ──────────────────────────────────────────────────────

  describe("progression with an empty wallet", () => {
    beforeEach(() => {
      fundAndWrap(fx, ALICE, 1000n, 1000n);
      fx.token.initiate(LIQUIDATOR, ALICE);
    });

    it("records cooldown and window bounds", () => {
      expect(fx.token.blockedUntil(ALICE)).toBe(10n);
      expect(fx.token.windowEnd(ALICE)).toBe(15n);
      expect(fx.token.snapshotAmount(ALICE)).toBe(1000n);
    });

    it("exposes nothing during cooldown", () => {
      fx.clock.advance(9n);
      expect(fx.token.getLiquidatableAmount(ALICE)).toEqual({ percentage: 0n, amount: 0n });
      expect(fx.token.liquidationPhase(ALICE).kind).toBe("cooldown");
    });

    it("grows from 10% to 100% across the window", () => {
      fx.clock.advance(10n);
      expect(fx.token.getLiquidatableAmount(ALICE)).toEqual({ percentage: 10n, amount: 100n });
      fx.clock.advance(2n);
      expect(fx.token.getLiquidatableAmount(ALICE)).toEqual({ percentage: 46n, amount: 460n });
      fx.clock.advance(3n);
      expect(fx.token.getLiquidatableAmount(ALICE)).toEqual({ percentage: 100n, amount: 1000n });
    });

    it("exposes nothing once the window has passed", () => {
      fx.clock.advance(16n);
      expect(fx.token.getLiquidatableAmount(ALICE)).toEqual({ percentage: 0n, amount: 0n });
      expect(fx.token.liquidationPhase(ALICE).kind).toBe("expired");
      expect(fx.token.blockedUntil(ALICE)).toBe(10n);
    });
  });

  // ─── Scenario B ──────────────────────────────────────────────────────

  describe("progression with underlying left in the wallet", () => {
    it("caps at 70 early and opens to 100 by the end", () => {
      fundAndWrap(fx, ALICE, 1600n, 1000n);
      expect(fx.underlying.balanceOf(ALICE)).toBe(600n);
      fx.token.initiate(LIQUIDATOR, ALICE);

      const wallet = fx.underlying.balanceOf(ALICE);
      const collateral = fx.target.getUserCollateral(ALICE);
      expect(walletCap(wallet, collateral, 0n, 5n)).toBe(70n);
      expect(walletCap(wallet, collateral, 1n, 5n)).toBe(76n);

      fx.clock.advance(10n);
      expect(fx.token.getLiquidatableAmount(ALICE)).toEqual({ percentage: 10n, amount: 100n });
      fx.clock.advance();
      expect(fx.token.getLiquidatableAmount(ALICE)).toEqual({ percentage: 28n, amount: 280n });
      fx.clock.advance();
      expect(fx.token.getLiquidatableAmount(ALICE)).toEqual({ percentage: 46n, amount: 460n });
      fx.clock.advance(3n);
      expect(fx.token.getLiquidatableAmount(ALICE)).toEqual({ percentage: 100n, amount: 1000n });
    });
  });

  // ─── Scenario C ──────────────────────────────────────────────────────

  describe("re-initiation", () => {
    beforeEach(() => {
      fundAndWrap(fx, ALICE, 1000n, 1000n);
      fx.token.initiate(LIQUIDATOR, ALICE);
    });

    it("rejects a second initiation inside the window", () => {
      fx.clock.advance(12n);
      expectBreakerError(() => fx.token.initiate(BOB, ALICE), "ALREADY_INITIATED");
      expect(fx.token.liquidationRecord(ALICE)).toEqual({
        blockedUntil: 10n,
        windowEnd: 15n,
        snapshotAmount: 1000n,
      });
    });

    it("accepts a new initiation after the window lapses unused", () => {
      fx.clock.advance(16n);
      const record = fx.token.initiate(BOB, ALICE);
      expect(record).toEqual({ blockedUntil: 26n, windowEnd: 31n, snapshotAmount: 1000n });
    });
  });

  // ─── Scenario D ──────────────────────────────────────────────────────

  describe("seizure against the ceiling", () => {
    beforeEach(() => {
      fundAndWrap(fx, ALICE, 1000n, 1000n);
      fx.token.approve(ALICE, LIQUIDATOR, 1000n);
      fx.token.initiate(LIQUIDATOR, ALICE);
      fx.clock.advance(12n);
    });

    it("rejects an over-ceiling seizure and changes nothing", () => {
      const before = fx.token.snapshot();
      const err = expectBreakerError(
        () => fx.token.transferFrom(LIQUIDATOR, ALICE, LIQUIDATOR, 461n),
        "EXCEEDS_LIMIT",
      );

      expect(err.category).toBe("limit-exceeded");
      expect(err.details).toEqual({
        principal: ALICE,
        requested: "461",
        ceiling: "460",
        percentage: "46",
      });
      expect(fx.token.snapshot()).toEqual(before);
      expect(fx.token.liquidationPhase(ALICE).kind).toBe("execution-window");
    });

    it("executes an exact-ceiling seizure and clears the record", () => {
      fx.token.transferFrom(LIQUIDATOR, ALICE, LIQUIDATOR, 460n);

      expect(fx.token.balanceOf(ALICE)).toBe(540n);
      expect(fx.token.balanceOf(LIQUIDATOR)).toBe(460n);
      expect(fx.token.allowance(ALICE, LIQUIDATOR)).toBe(540n);
      expect(fx.token.blockedUntil(ALICE)).toBe(0n);
      expect(fx.token.windowEnd(ALICE)).toBe(0n);
      expect(fx.token.snapshotAmount(ALICE)).toBe(0n);
      expect(fx.token.liquidationPhase(ALICE)).toEqual({ kind: "no-liquidation" });
    });

    it("needs a fresh initiation for a further tranche", () => {
      fx.token.transferFrom(LIQUIDATOR, ALICE, LIQUIDATOR, 100n);
      expectBreakerError(
        () => fx.token.transferFrom(LIQUIDATOR, ALICE, LIQUIDATOR, 100n),
        "MUST_INITIATE_FIRST",
      );
    });

    it("keeps the record when a stranger pulls zero", () => {
      expect(fx.token.allowance(ALICE, BOB)).toBe(0n);
      fx.token.transferFrom(BOB, ALICE, BOB, 0n);

      expect(fx.token.liquidationRecord(ALICE)).toEqual({
        blockedUntil: 10n,
        windowEnd: 15n,
        snapshotAmount: 1000n,
      });
      fx.token.transferFrom(LIQUIDATOR, ALICE, LIQUIDATOR, 100n);
      expect(fx.token.balanceOf(LIQUIDATOR)).toBe(100n);
      expect(fx.token.liquidationRecord(ALICE)).toBeUndefined();
    });
  });

  // ─── Guard rejections ────────────────────────────────────────────────

  describe("seizure guards", () => {
    beforeEach(() => {
      fundAndWrap(fx, ALICE, 1000n, 1000n);
      fx.token.approve(ALICE, LIQUIDATOR, 1000n);
      fx.clock.advance();
    });

    it("requires an initiation", () => {
      const err = expectBreakerError(
        () => fx.token.transferFrom(LIQUIDATOR, ALICE, LIQUIDATOR, 1n),
        "MUST_INITIATE_FIRST",
      );
      expect(err.category).toBe("precondition-missing");
    });

    it("blocks seizures during cooldown", () => {
      fx.token.initiate(LIQUIDATOR, ALICE);
      fx.clock.advance(9n);
      const err = expectBreakerError(
        () => fx.token.transferFrom(LIQUIDATOR, ALICE, LIQUIDATOR, 1n),
        "IN_COOLDOWN",
      );
      expect(err.category).toBe("temporal-guard");
    });

    it("blocks seizures after the window and keeps the stale record", () => {
      fx.token.initiate(LIQUIDATOR, ALICE);
      fx.clock.advance(16n);
      expectBreakerError(() => fx.token.transferFrom(LIQUIDATOR, ALICE, LIQUIDATOR, 1n), "WINDOW_EXPIRED");
      expect(fx.token.blockedUntil(ALICE)).toBe(11n);
      expect(fx.token.balanceOf(ALICE)).toBe(1000n);
    });

    it("checks the allowance before the breaker", () => {
      expect(() => fx.token.transferFrom(BOB, ALICE, BOB, 1n)).toThrow(LedgerError);
    });

    it("refuses to initiate against a healthy principal", () => {
      fx.target.liquidatable.delete(ALICE);
      const err = expectBreakerError(() => fx.token.initiate(LIQUIDATOR, ALICE), "NOT_LIQUIDATABLE");
      expect(err.category).toBe("policy-violation");
      expect(fx.token.liquidationRecord(ALICE)).toBeUndefined();
    });
  });

  // ─── Passthrough ─────────────────────────────────────────────────────

  describe("passthrough", () => {
    beforeEach(() => {
      fundAndWrap(fx, ALICE, 1000n, 1000n);
      fx.token.initiate(LIQUIDATOR, ALICE);
      fx.clock.advance(3n);
    });

    it("lets the owner push during cooldown", () => {
      fx.token.transfer(ALICE, BOB, 300n);
      expect(fx.token.balanceOf(BOB)).toBe(300n);
      expect(fx.token.liquidationPhase(ALICE).kind).toBe("cooldown");
    });

    it("lets a same-tick approve-then-pull through and leaves the record alone", () => {
      fx.token.approve(ALICE, BOB, 250n);
      fx.token.transferFrom(BOB, ALICE, BOB, 250n);

      expect(fx.token.balanceOf(BOB)).toBe(250n);
      expect(fx.token.liquidationRecord(ALICE)).toEqual({
        blockedUntil: 10n,
        windowEnd: 15n,
        snapshotAmount: 1000n,
      });
    });

    it("treats the same pull one tick later as a seizure", () => {
      fx.token.approve(ALICE, BOB, 250n);
      fx.clock.advance();
      expectBreakerError(() => fx.token.transferFrom(BOB, ALICE, BOB, 250n), "IN_COOLDOWN");
    });

    it("lets the holder unwrap during cooldown", () => {
      fx.token.withdraw(ALICE, 1000n);
      expect(fx.underlying.balanceOf(ALICE)).toBe(1000n);
      expect(fx.token.custodyBalance()).toBe(0n);
    });
  });

  // ─── Target binding ──────────────────────────────────────────────────

  describe("liquidation target", () => {
    function unboundToken(): CircuitBreakerToken {
      return new CircuitBreakerToken({
        address: TOKEN,
        symbol: "cUND",
        decimals: 8,
        underlying: fx.underlying,
        clock: new TickClock(),
      });
    }

    it("requires a bound target to initiate", () => {
      expectBreakerError(() => unboundToken().initiate(LIQUIDATOR, ALICE), "TARGET_UNBOUND");
    });

    it("binds a target once", () => {
      const token = unboundToken();
      const target = new StubTarget();
      token.bindLiquidationTarget(target);
      expectBreakerError(() => token.bindLiquidationTarget(target), "TARGET_ALREADY_BOUND");
    });

    it("reports nothing liquidatable without a target", () => {
      expect(unboundToken().getLiquidatableAmount(ALICE)).toEqual({ percentage: 0n, amount: 0n });
    });

    it("rejects a zero cooldown", () => {
      expectBreakerError(
        () =>
          new CircuitBreakerToken({
            address: TOKEN,
            symbol: "cUND",
            decimals: 8,
            underlying: fx.underlying,
            clock: new TickClock(),
            config: { cooldownDuration: 0n },
          }),
        "INVALID_CONFIG",
      );
    });

    it("opens a one-tick cooldown from tick 0 with a live record", () => {
      const clock = new TickClock();
      const token = new CircuitBreakerToken({
        address: TOKEN,
        symbol: "cUND",
        decimals: 8,
        underlying: fx.underlying,
        clock,
        config: { cooldownDuration: 1n, windowDuration: 5n },
        target: fx.target,
      });
      fx.underlying.mint(ALICE, 1000n);
      fx.underlying.approve(ALICE, TOKEN, 1000n);
      token.deposit(ALICE, 1000n);
      fx.target.liquidatable.add(ALICE);
      fx.target.collateral.set(ALICE, 1000n);

      token.initiate(LIQUIDATOR, ALICE);
      expect(token.blockedUntil(ALICE)).toBe(1n);
      expect(token.windowEnd(ALICE)).toBe(6n);

      clock.advance(6n);
      expect(token.getLiquidatableAmount(ALICE)).toEqual({ percentage: 100n, amount: 1000n });
      expectBreakerError(() => token.initiate(BOB, ALICE), "ALREADY_INITIATED");
    });

    it("rejects a zero window", () => {
      expect(
        () =>
          new CircuitBreakerToken({
            address: TOKEN,
            symbol: "cUND",
            decimals: 8,
            underlying: fx.underlying,
            clock: new TickClock(),
            config: { windowDuration: 0n },
          }),
      ).toThrow(BreakerError);
    });
  });

  // ─── Events ──────────────────────────────────────────────────────────

  describe("events", () => {
    it("appends custody, approval and liquidation events after each commit", () => {
      const events = new InMemoryEventStore();
      const f = createFixture(events);
      fundAndWrap(f, ALICE, 1000n, 1000n);
      f.token.approve(ALICE, LIQUIDATOR, 1000n);
      f.token.initiate(LIQUIDATOR, ALICE);
      f.clock.advance(12n);
      f.token.transferFrom(LIQUIDATOR, ALICE, LIQUIDATOR, 460n);

      expect(events.readAll().map((e) => e.event.type)).toEqual([
        BREAKER_EVENTS.CUSTODY_DEPOSITED,
        BREAKER_EVENTS.APPROVAL_GRANTED,
        BREAKER_EVENTS.LIQUIDATION_INITIATED,
        BREAKER_EVENTS.LIQUIDATION_EXECUTED,
      ]);

      const [initiated, executed] = events.read(`liquidation:${ALICE}`);
      expect(initiated?.event.payload).toEqual({
        principal: ALICE,
        initiator: LIQUIDATOR,
        initiatedAt: "0",
        blockedUntil: "10",
        windowEnd: "15",
        snapshotAmount: "1000",
      });
      expect(executed?.event.payload).toEqual({
        principal: ALICE,
        spender: LIQUIDATOR,
        recipient: LIQUIDATOR,
        amount: "460",
        percentage: "46",
        ceiling: "460",
        executedAt: "12",
      });
      expect(executed?.event.metadata.tick).toBe("12");
      expect(events.verifyIntegrity().valid).toBe(true);
    });

    it("appends nothing for a rejected seizure", () => {
      const events = new InMemoryEventStore();
      const f = createFixture(events);
      fundAndWrap(f, ALICE, 1000n, 1000n);
      f.token.approve(ALICE, LIQUIDATOR, 1000n);
      f.clock.advance();
      const position = events.globalPosition();

      expect(() => f.token.transferFrom(LIQUIDATOR, ALICE, LIQUIDATOR, 1n)).toThrow(BreakerError);
      expect(events.globalPosition()).toBe(position);
    });
  });
});
