import type { Amount, Principal } from "@breakwater/types";
import { InMemoryUnderlyingAsset } from "@breakwater/ledger";
import { InMemoryEventStore } from "@breakwater/event-store";
import { CircuitBreakerToken, TickClock } from "@breakwater/breaker";
import { LendingProtocol } from "../src/lending-protocol.js";
import { PositionMonitor } from "../src/position-monitor.js";

export const ALICE: Principal = "0x1111111111111111111111111111111111111111";
export const BOB: Principal = "0x2222222222222222222222222222222222222222";
export const LIQUIDATOR: Principal = "0x3333333333333333333333333333333333333333";
export const PROTOCOL: Principal = "0x4444444444444444444444444444444444444444";
export const TOKEN: Principal = "0x9999999999999999999999999999999999999999";

/** 0.5 in 18-decimal fixed point */
export const UNHEALTHY = 5n * 10n ** 17n;

export interface Deployment {
  readonly clock: TickClock;
  readonly underlying: InMemoryUnderlyingAsset;
  readonly events: InMemoryEventStore;
  readonly token: CircuitBreakerToken;
  readonly protocol: LendingProtocol;
  readonly monitor: PositionMonitor;
}

export function deploy(): Deployment {
  const clock = new TickClock();
  const underlying = new InMemoryUnderlyingAsset({ symbol: "UND", decimals: 8 });
  const events = new InMemoryEventStore();
  const token = new CircuitBreakerToken({
    address: TOKEN,
    symbol: "cUND",
    decimals: 8,
    underlying,
    clock,
    config: { cooldownDuration: 10n, windowDuration: 5n },
    events,
  });
  const protocol = new LendingProtocol({ address: PROTOCOL, token, events });
  token.bindLiquidationTarget(protocol);
  const monitor = new PositionMonitor(protocol, token);
  return { clock, underlying, events, token, protocol, monitor };
}

/**
 * Wrap `amount` underlying for `borrower` and pledge all of it.
 */
export function openLoan(d: Deployment, borrower: Principal, amount: Amount, healthFactor: bigint): void {
  d.underlying.mint(borrower, amount);
  d.underlying.approve(borrower, TOKEN, amount);
  d.token.deposit(borrower, amount);
  d.token.approve(borrower, PROTOCOL, amount);
  d.protocol.depositCollateral(borrower, amount);
  d.protocol.setHealthFactor(borrower, borrower, healthFactor);
}
