/**
 * @breakwater/breaker: CircuitBreakerToken.
 *
 * The public face of the wrapper. Composes:
 * - TokenLedger guarded by the TransferInterceptor
 * - CustodyGateway for wrap/unwrap
 * - DepositClassifier fed by every approve
 * - LiquidationStateMachine + progressive ceiling
 *
 * Callers are passed explicitly. Each operation commits fully or throws
 * with no state changed; events are appended after the commit.
 */

import type {
  Amount,
  LiquidatableAmount,
  LiquidationPhase,
  LiquidationRecord,
  LiquidationTarget,
  Principal,
  Tick,
  UnderlyingAsset,
} from "@breakwater/types";
import { TokenLedger, toPrincipal } from "@breakwater/ledger";
import type { LedgerSnapshot } from "@breakwater/ledger";
import { BREAKER_EVENTS, createDomainEvent } from "@breakwater/event-store";
import type { EventStore } from "@breakwater/event-store";
import { CustodyGateway } from "./custody-gateway.js";
import { DepositClassifier } from "./deposit-classifier.js";
import { approvalStream, custodyStream, liquidationStream } from "./events.js";
import { LiquidationStateMachine } from "./liquidation-state.js";
import { computeLiquidatableAmount, NOTHING_LIQUIDATABLE } from "./progressive-calculator.js";
import type { Clock } from "./tick-clock.js";
import { TransferInterceptor } from "./transfer-interceptor.js";
import type { SeizureReceipt } from "./transfer-interceptor.js";
import type { BreakerConfig } from "./types.js";
import { BreakerError, createBreakerConfig } from "./types.js";

export interface CircuitBreakerTokenOptions {
  /** The wrapper's own account on the underlying asset (the custodian) */
  readonly address: Principal;
  readonly symbol: string;
  readonly decimals: number;
  readonly underlying: UnderlyingAsset;
  readonly clock: Clock;
  readonly config?: Partial<BreakerConfig> | undefined;
  /** May be bound later with bindLiquidationTarget */
  readonly target?: LiquidationTarget | undefined;
  readonly events?: EventStore | undefined;
}

export class CircuitBreakerToken {
  readonly address: Principal;
  readonly symbol: string;
  readonly decimals: number;
  readonly config: BreakerConfig;

  private readonly _clock: Clock;
  private readonly _underlying: UnderlyingAsset;
  private readonly _events: EventStore | undefined;
  private readonly _ledger: TokenLedger;
  private readonly _custody: CustodyGateway;
  private readonly _classifier: DepositClassifier;
  private readonly _liquidations: LiquidationStateMachine;
  private readonly _interceptor: TransferInterceptor;
  private _target: LiquidationTarget | undefined;
  /** Filled by the interceptor's commit effect during transferFrom */
  private readonly _committedSeizures: SeizureReceipt[] = [];

  constructor(options: CircuitBreakerTokenOptions) {
    this.address = toPrincipal(options.address);
    this.symbol = options.symbol;
    this.decimals = options.decimals;
    this.config = createBreakerConfig(options.config);

    this._clock = options.clock;
    this._underlying = options.underlying;
    this._events = options.events;
    this._target = options.target;

    this._classifier = new DepositClassifier(this._clock);
    this._liquidations = new LiquidationStateMachine(this.config, this._clock);
    this._interceptor = new TransferInterceptor({
      classifier: this._classifier,
      stateMachine: this._liquidations,
      clock: this._clock,
      ceiling: (principal) => this.getLiquidatableAmount(principal),
      onSeizure: (receipt) => {
        this._committedSeizures.push(receipt);
      },
    });
    this._ledger = new TokenLedger({ guard: this._interceptor });
    this._custody = new CustodyGateway(this._ledger, this._underlying, this.address);
  }

  /**
   * Attach the lending protocol. Allowed once, for deployments where the
   * protocol is built after the token.
   */
  bindLiquidationTarget(target: LiquidationTarget): void {
    if (this._target !== undefined) {
      throw new BreakerError("TARGET_ALREADY_BOUND", `Token ${this.symbol} already has a liquidation target`);
    }
    this._target = target;
  }

  get interceptor(): TransferInterceptor {
    return this._interceptor;
  }

  // ─── Custody ───────────────────────────────────────────────────────────

  deposit(caller: Principal, amount: Amount): void {
    const account = this._custody.deposit(caller, amount);
    this.emit(custodyStream(account), BREAKER_EVENTS.CUSTODY_DEPOSITED, account, {
      principal: account,
      amount: amount.toString(),
    });
  }

  withdraw(caller: Principal, amount: Amount): void {
    const account = this._custody.withdraw(caller, amount);
    this.emit(custodyStream(account), BREAKER_EVENTS.CUSTODY_WITHDRAWN, account, {
      principal: account,
      amount: amount.toString(),
    });
  }

  custodyBalance(): Amount {
    return this._custody.custodyBalance();
  }

  // ─── Token ─────────────────────────────────────────────────────────────

  balanceOf(holder: Principal): Amount {
    return this._ledger.balanceOf(holder);
  }

  allowance(owner: Principal, spender: Principal): Amount {
    return this._ledger.allowance(owner, spender);
  }

  get totalSupply(): Amount {
    return this._ledger.totalSupply;
  }

  /**
   * Set an allowance and mark the grant tick for deposit classification.
   */
  approve(owner: Principal, spender: Principal, amount: Amount): void {
    const o = toPrincipal(owner);
    const s = toPrincipal(spender);
    this._ledger.approve(o, s, amount);
    const grantedAt = this._classifier.recordApproval(o, s);

    this.emit(approvalStream(o), BREAKER_EVENTS.APPROVAL_GRANTED, o, {
      owner: o,
      spender: s,
      amount: amount.toString(),
      grantedAt: grantedAt.toString(),
    });
  }

  transfer(caller: Principal, to: Principal, amount: Amount): void {
    this._ledger.transfer(caller, to, amount);
  }

  /**
   * Pull from `from` on behalf of `spender`. Outside a same-tick deposit
   * this is a seizure and must fit the current liquidation ceiling.
   */
  transferFrom(spender: Principal, from: Principal, to: Principal, amount: Amount): void {
    this._committedSeizures.length = 0;
    this._ledger.transferFrom(spender, from, to, amount);

    const seizure = this._committedSeizures.shift();
    if (seizure !== undefined) {
      this.emit(liquidationStream(seizure.principal), BREAKER_EVENTS.LIQUIDATION_EXECUTED, seizure.spender, {
        principal: seizure.principal,
        spender: seizure.spender,
        recipient: seizure.recipient,
        amount: seizure.amount.toString(),
        percentage: seizure.percentage.toString(),
        ceiling: seizure.ceiling.toString(),
        executedAt: seizure.tick.toString(),
      });
    }
  }

  snapshot(): LedgerSnapshot {
    return this._ledger.snapshot();
  }

  // ─── Liquidation ───────────────────────────────────────────────────────

  /**
   * Open a liquidation against `principal`. Anyone may call; the target
   * decides eligibility.
   */
  initiate(caller: Principal, principal: Principal): LiquidationRecord {
    const initiator = toPrincipal(caller);
    const p = toPrincipal(principal);
    const target = this.requireTarget();
    const initiatedAt = this._clock.now();

    const record = this._liquidations.initiate(p, target);

    this.emit(liquidationStream(p), BREAKER_EVENTS.LIQUIDATION_INITIATED, initiator, {
      principal: p,
      initiator,
      initiatedAt: initiatedAt.toString(),
      blockedUntil: record.blockedUntil.toString(),
      windowEnd: record.windowEnd.toString(),
      snapshotAmount: record.snapshotAmount.toString(),
    });
    return record;
  }

  getLiquidatableAmount(principal: Principal): LiquidatableAmount {
    const p = toPrincipal(principal);
    const phase = this._liquidations.phase(p);
    if (phase.kind !== "execution-window" || this._target === undefined) {
      return NOTHING_LIQUIDATABLE;
    }

    return computeLiquidatableAmount({
      record: phase.record,
      now: this._clock.now(),
      windowDuration: this.config.windowDuration,
      walletBalance: this._underlying.balanceOf(p),
      collateral: this._target.getUserCollateral(p),
    });
  }

  /** 0 when no record exists. */
  blockedUntil(principal: Principal): Tick {
    return this.liquidationRecord(principal)?.blockedUntil ?? 0n;
  }

  /** 0 when no record exists. */
  windowEnd(principal: Principal): Tick {
    return this.liquidationRecord(principal)?.windowEnd ?? 0n;
  }

  /** 0 when no record exists. */
  snapshotAmount(principal: Principal): Amount {
    return this.liquidationRecord(principal)?.snapshotAmount ?? 0n;
  }

  liquidationRecord(principal: Principal): LiquidationRecord | undefined {
    return this._liquidations.record(toPrincipal(principal));
  }

  liquidationPhase(principal: Principal): LiquidationPhase {
    return this._liquidations.phase(toPrincipal(principal));
  }

  /** Tick of the most recent grant from `owner` to `spender`, if any. */
  lastApproval(owner: Principal, spender: Principal): Tick | undefined {
    return this._classifier.lastApproval(toPrincipal(owner), toPrincipal(spender));
  }

  now(): Tick {
    return this._clock.now();
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private requireTarget(): LiquidationTarget {
    if (this._target === undefined) {
      throw new BreakerError("TARGET_UNBOUND", `Token ${this.symbol} has no liquidation target bound`);
    }
    return this._target;
  }

  private emit(
    streamId: string,
    type: string,
    actor: string,
    payload: Readonly<Record<string, string>>,
  ): void {
    this._events?.append(streamId, [
      createDomainEvent(type, payload, { source: "breaker", actor, tick: this._clock.now() }),
    ]);
  }
}
