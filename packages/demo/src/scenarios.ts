/**
 * @breakwater/demo: Liquidation scenarios.
 *
 * Each scenario builds a fresh deployment from the real packages, drives
 * it through a liquidation, and returns what happened step by step.
 * Rendering lives in index.ts; the tests assert the steps directly.
 */

import type { Amount, Principal, Tick } from "@breakwater/types";
import { BreakerError, CircuitBreakerToken, TickClock } from "@breakwater/breaker";
import { InMemoryUnderlyingAsset } from "@breakwater/ledger";
import { LendingProtocol, PositionMonitor } from "@breakwater/lending";
import { InMemoryEventStore } from "@breakwater/event-store";

export const BORROWER: Principal = "0x1111111111111111111111111111111111111111";
export const LIQUIDATOR: Principal = "0x3333333333333333333333333333333333333333";
export const RIVAL: Principal = "0x5555555555555555555555555555555555555555";
export const PROTOCOL: Principal = "0x4444444444444444444444444444444444444444";
export const TOKEN: Principal = "0x9999999999999999999999999999999999999999";

/** 0.5 in 18-decimal fixed point */
const UNHEALTHY = 5n * 10n ** 17n;

export interface Deployment {
  readonly clock: TickClock;
  readonly underlying: InMemoryUnderlyingAsset;
  readonly events: InMemoryEventStore;
  readonly token: CircuitBreakerToken;
  readonly protocol: LendingProtocol;
  readonly monitor: PositionMonitor;
}

/**
 * Cooldown 10 ticks, window 5 ticks, clock at 0.
 */
export function deploy(): Deployment {
  const clock = new TickClock();
  const underlying = new InMemoryUnderlyingAsset({ symbol: "WBTC", decimals: 8 });
  const events = new InMemoryEventStore();
  const token = new CircuitBreakerToken({
    address: TOKEN,
    symbol: "cWBTC",
    decimals: 8,
    underlying,
    clock,
    config: { cooldownDuration: 10n, windowDuration: 5n },
    events,
  });
  const protocol = new LendingProtocol({ address: PROTOCOL, token, events });
  token.bindLiquidationTarget(protocol);
  return { clock, underlying, events, token, protocol, monitor: new PositionMonitor(protocol, token) };
}

/**
 * Wrap and pledge `collateral`, keep `wallet` underlying outside custody,
 * and mark the position unhealthy.
 */
export function openUnhealthyLoan(d: Deployment, collateral: Amount, wallet: Amount = 0n): void {
  d.underlying.mint(BORROWER, collateral + wallet);
  d.underlying.approve(BORROWER, TOKEN, collateral);
  d.token.deposit(BORROWER, collateral);
  d.token.approve(BORROWER, PROTOCOL, collateral);
  d.protocol.depositCollateral(BORROWER, collateral);
  d.protocol.setHealthFactor(LIQUIDATOR, BORROWER, UNHEALTHY);
}

// =============================================================================
// Steps
// =============================================================================

export interface ScenarioStep {
  readonly tick: Tick;
  readonly action: string;
  readonly outcome: "ok" | "rejected";
  /** Error code for rejected steps, a short summary otherwise */
  readonly detail: string;
}

export interface ScenarioResult {
  readonly id: "A" | "B" | "C" | "D";
  readonly title: string;
  readonly steps: readonly ScenarioStep[];
}

class StepLog {
  readonly steps: ScenarioStep[] = [];

  constructor(private readonly d: Deployment) {}

  /** Run `fn`; a BreakerError becomes a rejected step, anything else propagates. */
  attempt(action: string, fn: () => string): void {
    const tick = this.d.clock.now();
    try {
      this.steps.push({ tick, action, outcome: "ok", detail: fn() });
    } catch (err) {
      if (!(err instanceof BreakerError)) {
        throw err;
      }
      this.steps.push({ tick, action, outcome: "rejected", detail: err.code });
    }
  }

  ceiling(): void {
    this.attempt("read ceiling", () => {
      const { percentage, amount } = this.d.token.getLiquidatableAmount(BORROWER);
      return `${percentage.toString()}% = ${amount.toString()}`;
    });
  }

  initiate(caller: Principal): void {
    this.attempt(`initiate (${label(caller)})`, () => {
      const record = this.d.token.initiate(caller, BORROWER);
      return `blockedUntil ${record.blockedUntil.toString()}, windowEnd ${record.windowEnd.toString()}, snapshot ${record.snapshotAmount.toString()}`;
    });
  }

  liquidate(amount: Amount): void {
    this.attempt(`liquidate ${amount.toString()}`, () => {
      const position = this.d.protocol.liquidate(LIQUIDATOR, BORROWER, amount, LIQUIDATOR);
      return `collateral left ${position.collateral.toString()}`;
    });
  }

  advanceTo(tick: Tick): void {
    this.d.clock.advance(tick - this.d.clock.now());
  }
}

function label(principal: Principal): string {
  return principal === RIVAL ? "rival" : "liquidator";
}

// =============================================================================
// Scenarios
// =============================================================================

/** Empty wallet: the ceiling follows the base ramp alone. */
export function scenarioA(): ScenarioResult {
  const d = deploy();
  openUnhealthyLoan(d, 1000n);
  const log = new StepLog(d);

  log.initiate(LIQUIDATOR);
  for (const tick of [10n, 12n, 15n]) {
    log.advanceTo(tick);
    log.ceiling();
  }
  return { id: "A", title: "Progressive ramp, empty wallet", steps: log.steps };
}

/** 600 underlying held outside the protocol against 1000 collateral. */
export function scenarioB(): ScenarioResult {
  const d = deploy();
  openUnhealthyLoan(d, 1000n, 600n);
  const log = new StepLog(d);

  log.initiate(LIQUIDATOR);
  log.advanceTo(10n);
  log.ceiling();
  log.advanceTo(15n);
  log.ceiling();
  return { id: "B", title: "Wallet-aware cap", steps: log.steps };
}

/** Two initiators race; the window lapses unused; a third initiate starts over. */
export function scenarioC(): ScenarioResult {
  const d = deploy();
  openUnhealthyLoan(d, 1000n);
  const log = new StepLog(d);

  log.initiate(LIQUIDATOR);
  log.initiate(RIVAL);
  log.advanceTo(12n);
  log.initiate(RIVAL);
  log.advanceTo(16n);
  log.liquidate(100n);
  log.initiate(RIVAL);
  return { id: "C", title: "Racing initiators and an unused window", steps: log.steps };
}

/** Over-ceiling seizure fails atomically; an exact-ceiling seizure clears the record. */
export function scenarioD(): ScenarioResult {
  const d = deploy();
  openUnhealthyLoan(d, 1000n);
  const log = new StepLog(d);

  log.initiate(LIQUIDATOR);
  log.advanceTo(5n);
  log.liquidate(100n);
  log.advanceTo(11n);
  log.ceiling();
  log.liquidate(300n);
  log.ceiling();
  log.liquidate(280n);
  log.ceiling();
  return { id: "D", title: "Seizing at the ceiling", steps: log.steps };
}

export const SCENARIOS: readonly (() => ScenarioResult)[] = [
  scenarioA,
  scenarioB,
  scenarioC,
  scenarioD,
];
