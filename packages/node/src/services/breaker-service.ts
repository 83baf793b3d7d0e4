/**
 * BreakerService: one circuit-breaker deployment.
 *
 * Wires the shared tick clock, the underlying asset, the wrapper token,
 * the reference lending protocol and the event store together.
 * Route handlers reach the domain objects through this service.
 */

import type { Principal, Tick } from "@breakwater/types";
import { CircuitBreakerToken, TickClock } from "@breakwater/breaker";
import { InMemoryUnderlyingAsset, toPrincipal } from "@breakwater/ledger";
import { LendingProtocol, PositionMonitor } from "@breakwater/lending";
import {
  BREAKER_EVENTS,
  createBreakerCatalog,
  createDomainEvent,
  InMemoryEventStore,
} from "@breakwater/event-store";
import type {
  EventCatalog,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
} from "@breakwater/event-store";

export const CLOCK_STREAM = "clock";

export interface BreakerServiceConfig {
  readonly tokenAddress: string;
  readonly protocolAddress: string;
  readonly tokenSymbol: string;
  readonly tokenDecimals: number;
  readonly underlyingSymbol: string;
  readonly cooldownTicks: bigint;
  readonly windowTicks: bigint;
  /** Defaults to 0 */
  readonly startTick?: bigint | undefined;
}

export const DEFAULT_SERVICE_CONFIG: BreakerServiceConfig = {
  tokenAddress: "0x00000000000000000000000000000000000b4e01",
  protocolAddress: "0x00000000000000000000000000000000000b4e02",
  tokenSymbol: "cWBTC",
  tokenDecimals: 18,
  underlyingSymbol: "WBTC",
  cooldownTicks: 10n,
  windowTicks: 5n,
};

export interface ClockAdvance {
  readonly from: Tick;
  readonly to: Tick;
}

export class BreakerService {
  readonly clock: TickClock;
  readonly underlying: InMemoryUnderlyingAsset;
  readonly token: CircuitBreakerToken;
  readonly protocol: LendingProtocol;
  readonly monitor: PositionMonitor;
  readonly eventStore: InMemoryEventStore;
  readonly catalog: EventCatalog;

  constructor(config: BreakerServiceConfig = DEFAULT_SERVICE_CONFIG) {
    this.clock = new TickClock(config.startTick ?? 0n);
    this.eventStore = new InMemoryEventStore();
    this.catalog = createBreakerCatalog();

    this.underlying = new InMemoryUnderlyingAsset({
      symbol: config.underlyingSymbol,
      decimals: config.tokenDecimals,
    });

    this.token = new CircuitBreakerToken({
      address: toPrincipal(config.tokenAddress),
      symbol: config.tokenSymbol,
      decimals: config.tokenDecimals,
      underlying: this.underlying,
      clock: this.clock,
      config: {
        cooldownDuration: config.cooldownTicks,
        windowDuration: config.windowTicks,
      },
      events: this.eventStore,
    });

    this.protocol = new LendingProtocol({
      address: toPrincipal(config.protocolAddress),
      token: this.token,
      events: this.eventStore,
    });
    this.token.bindLiquidationTarget(this.protocol);

    this.monitor = new PositionMonitor(this.protocol, this.token);
  }

  // ─── Clock ─────────────────────────────────────────────────────────

  /**
   * Move the shared clock forward and record the step.
   */
  advance(ticks: Tick = 1n, actor = "node"): ClockAdvance {
    const from = this.clock.now();
    const to = this.clock.advance(ticks);
    this.eventStore.append(CLOCK_STREAM, [
      createDomainEvent(
        BREAKER_EVENTS.CLOCK_ADVANCED,
        { from: from.toString(), to: to.toString() },
        { source: "node", actor, tick: to },
      ),
    ]);
    return { from, to };
  }

  // ─── Underlying ────────────────────────────────────────────────────

  /**
   * Dev-network faucet for the underlying asset.
   */
  faucet(to: Principal, amount: bigint): bigint {
    this.underlying.mint(to, amount);
    return this.underlying.balanceOf(to);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(
    streamId: string,
    options?: ReadOptions,
  ): readonly HashedStoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  /**
   * Hash-chain check plus catalog validation of every stored payload.
   */
  checkEventStore(): { integrity: EventStoreIntegrityResult; invalidEvents: number } {
    const integrity = this.eventStore.verifyIntegrity();
    const invalidEvents = this.eventStore
      .readAll()
      .filter((stored) => !this.catalog.validate(stored.event.type, stored.event.payload))
      .length;
    return { integrity, invalidEvents };
  }
}
