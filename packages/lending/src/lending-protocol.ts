/**
 * @breakwater/lending: Reference lending protocol.
 *
 * A minimal protocol that accepts circuit-breaker tokens as collateral.
 * Pledged collateral stays in the borrower's wallet; the protocol holds
 * an allowance over it and pulls through transferFrom when liquidating,
 * so every seizure passes the token's breaker.
 *
 * Health factors are set directly (no price feeds or debt accounting).
 */

import type { Amount, LiquidationRecord, LiquidationTarget, Principal } from "@breakwater/types";
import { assertAmount, toPrincipal } from "@breakwater/ledger";
import { BREAKER_EVENTS, createDomainEvent } from "@breakwater/event-store";
import type { EventStore } from "@breakwater/event-store";
import type { CollateralToken, Position } from "./types.js";
import { HEALTH_FACTOR_ONE, LendingError } from "./types.js";

export interface LendingProtocolOptions {
  /** The protocol's own account; the spender on every collateral pull */
  readonly address: Principal;
  readonly token: CollateralToken;
  readonly events?: EventStore | undefined;
}

interface MutablePosition {
  collateral: Amount;
  healthFactor: bigint;
}

export class LendingProtocol implements LiquidationTarget {
  readonly address: Principal;
  private readonly _token: CollateralToken;
  private readonly _events: EventStore | undefined;
  private readonly _positions = new Map<Principal, MutablePosition>();

  constructor(options: LendingProtocolOptions) {
    this.address = toPrincipal(options.address);
    this._token = options.token;
    this._events = options.events;
  }

  // ─── LiquidationTarget ─────────────────────────────────────────────────

  canLiquidate(principal: Principal): boolean {
    const position = this._positions.get(toPrincipal(principal));
    return (
      position !== undefined &&
      position.collateral > 0n &&
      position.healthFactor < HEALTH_FACTOR_ONE
    );
  }

  getUserCollateral(principal: Principal): Amount {
    return this._positions.get(toPrincipal(principal))?.collateral ?? 0n;
  }

  // ─── Collateral ────────────────────────────────────────────────────────

  /**
   * Pledge `amount` more wrapped collateral. The borrower must hold it and
   * must have approved the protocol for the full pledged total.
   */
  depositCollateral(caller: Principal, amount: Amount): Position {
    const borrower = toPrincipal(caller);
    assertAmount(amount);

    const current = this.getUserCollateral(borrower);
    const total = current + amount;

    const approved = this._token.allowance(borrower, this.address);
    if (approved < total) {
      throw new LendingError(
        "INSUFFICIENT_APPROVAL",
        `Protocol is approved for ${approved.toString()} of ${borrower}'s collateral, needs ${total.toString()}`,
      );
    }
    const held = this._token.balanceOf(borrower);
    if (held < total) {
      throw new LendingError(
        "INSUFFICIENT_COLLATERAL",
        `${borrower} holds ${held.toString()} wrapped units, cannot pledge ${total.toString()}`,
      );
    }

    const position = this.upsert(borrower);
    position.collateral = total;

    this.emit(BREAKER_EVENTS.COLLATERAL_DEPOSITED, borrower, borrower, {
      borrower,
      amount: amount.toString(),
      collateral: total.toString(),
    });
    return this.position(borrower);
  }

  withdrawCollateral(caller: Principal, amount: Amount): Position {
    const borrower = toPrincipal(caller);
    assertAmount(amount);

    const current = this.getUserCollateral(borrower);
    if (current < amount) {
      throw new LendingError(
        "INSUFFICIENT_COLLATERAL",
        `${borrower} has ${current.toString()} pledged, cannot release ${amount.toString()}`,
      );
    }

    const position = this.upsert(borrower);
    position.collateral = current - amount;

    this.emit(BREAKER_EVENTS.COLLATERAL_WITHDRAWN, borrower, borrower, {
      borrower,
      amount: amount.toString(),
      collateral: position.collateral.toString(),
    });
    return this.position(borrower);
  }

  // ─── Health ────────────────────────────────────────────────────────────

  /**
   * Set a borrower's health factor (18-decimal fixed point).
   */
  setHealthFactor(caller: Principal, borrowerAddress: Principal, healthFactor: bigint): Position {
    const borrower = toPrincipal(borrowerAddress);
    if (healthFactor < 0n) {
      throw new LendingError(
        "INVALID_HEALTH_FACTOR",
        `Health factor must be >= 0, got ${healthFactor.toString()}`,
      );
    }

    this.upsert(borrower).healthFactor = healthFactor;

    this.emit(BREAKER_EVENTS.HEALTH_FACTOR_UPDATED, borrower, toPrincipal(caller), {
      borrower,
      healthFactor: healthFactor.toString(),
    });
    return this.position(borrower);
  }

  /** Unset health factors read as exactly 1e18 (healthy). */
  healthFactor(principal: Principal): bigint {
    return this._positions.get(toPrincipal(principal))?.healthFactor ?? HEALTH_FACTOR_ONE;
  }

  // ─── Liquidation ───────────────────────────────────────────────────────

  /**
   * Open a liquidation on the token. Eligibility comes back to this
   * protocol through canLiquidate.
   */
  initiateLiquidation(caller: Principal, borrower: Principal): LiquidationRecord {
    return this._token.initiate(caller, borrower);
  }

  /**
   * Seize `amount` of the borrower's collateral to `recipient`.
   * The token's breaker decides whether the amount is allowed.
   */
  liquidate(caller: Principal, borrowerAddress: Principal, amount: Amount, recipient: Principal): Position {
    const borrower = toPrincipal(borrowerAddress);
    const liquidator = toPrincipal(caller);
    const to = toPrincipal(recipient);

    this._token.transferFrom(this.address, borrower, to, amount);

    const position = this.upsert(borrower);
    position.collateral = position.collateral > amount ? position.collateral - amount : 0n;

    this.emit(BREAKER_EVENTS.POSITION_LIQUIDATED, borrower, liquidator, {
      borrower,
      liquidator,
      recipient: to,
      amount: amount.toString(),
      collateral: position.collateral.toString(),
    });
    return this.position(borrower);
  }

  // ─── Reads ─────────────────────────────────────────────────────────────

  position(principal: Principal): Position {
    const borrower = toPrincipal(principal);
    return {
      borrower,
      collateral: this.getUserCollateral(borrower),
      healthFactor: this.healthFactor(borrower),
    };
  }

  /** Every borrower the protocol has seen, in first-seen order. */
  borrowers(): readonly Principal[] {
    return [...this._positions.keys()];
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private upsert(borrower: Principal): MutablePosition {
    let position = this._positions.get(borrower);
    if (position === undefined) {
      position = { collateral: 0n, healthFactor: HEALTH_FACTOR_ONE };
      this._positions.set(borrower, position);
    }
    return position;
  }

  private emit(
    type: string,
    borrower: Principal,
    actor: string,
    payload: Readonly<Record<string, string>>,
  ): void {
    this._events?.append(`lending:${borrower}`, [
      createDomainEvent(type, payload, { source: "lending", actor, tick: this._token.now() }),
    ]);
  }
}
