import type { Amount, LiquidationTarget, Principal } from "@breakwater/types";
import { InMemoryUnderlyingAsset } from "@breakwater/ledger";
import type { EventStore } from "@breakwater/event-store";
import { CircuitBreakerToken } from "../src/circuit-breaker-token.js";
import { TickClock } from "../src/tick-clock.js";

export const ALICE: Principal = "0x1111111111111111111111111111111111111111";
export const BOB: Principal = "0x2222222222222222222222222222222222222222";
export const LIQUIDATOR: Principal = "0x3333333333333333333333333333333333333333";
export const TOKEN: Principal = "0x9999999999999999999999999999999999999999";

/**
 * Lending stand-in: eligibility and collateral set directly by the test.
 */
export class StubTarget implements LiquidationTarget {
  readonly liquidatable = new Set<Principal>();
  readonly collateral = new Map<Principal, Amount>();
  collateralQueries = 0;

  canLiquidate(principal: Principal): boolean {
    return this.liquidatable.has(principal);
  }

  getUserCollateral(principal: Principal): Amount {
    this.collateralQueries += 1;
    return this.collateral.get(principal) ?? 0n;
  }
}

export interface Fixture {
  readonly clock: TickClock;
  readonly underlying: InMemoryUnderlyingAsset;
  readonly target: StubTarget;
  readonly token: CircuitBreakerToken;
}

export function createFixture(events?: EventStore): Fixture {
  const clock = new TickClock();
  const underlying = new InMemoryUnderlyingAsset({ symbol: "UND", decimals: 8 });
  const target = new StubTarget();
  const token = new CircuitBreakerToken({
    address: TOKEN,
    symbol: "cUND",
    decimals: 8,
    underlying,
    clock,
    config: { cooldownDuration: 10n, windowDuration: 5n },
    target,
    events,
  });
  return { clock, underlying, target, token };
}

/**
 * Fund `holder` with `minted` underlying, wrap `wrapped` of it, and
 * register it with the target as liquidatable collateral.
 */
export function fundAndWrap(fx: Fixture, holder: Principal, minted: Amount, wrapped: Amount): void {
  fx.underlying.mint(holder, minted);
  fx.underlying.approve(holder, TOKEN, wrapped);
  fx.token.deposit(holder, wrapped);
  fx.target.collateral.set(holder, wrapped);
  fx.target.liquidatable.add(holder);
}
