/**
 * @breakwater/lending: Types.
 */

import type {
  Amount,
  LiquidatableAmount,
  LiquidationPhase,
  LiquidationRecord,
  Principal,
  Tick,
} from "@breakwater/types";

/** Health factors are fixed-point with 18 decimals; below 1e18 is unhealthy. */
export const HEALTH_FACTOR_ONE: bigint = 10n ** 18n;

/**
 * What the lending protocol needs from the wrapped collateral token.
 * CircuitBreakerToken satisfies this structurally.
 */
export interface CollateralToken {
  balanceOf(holder: Principal): Amount;
  allowance(owner: Principal, spender: Principal): Amount;
  transferFrom(spender: Principal, from: Principal, to: Principal, amount: Amount): void;
  initiate(caller: Principal, principal: Principal): LiquidationRecord;
  getLiquidatableAmount(principal: Principal): LiquidatableAmount;
  liquidationPhase(principal: Principal): LiquidationPhase;
  now(): Tick;
}

export interface Position {
  readonly borrower: Principal;
  readonly collateral: Amount;
  readonly healthFactor: bigint;
}

// ─── Position Monitor ────────────────────────────────────────────────────

export type PositionStatus = "healthy" | "liquidatable" | "cooldown" | "window" | "expired";

export type PositionAction = "none" | "initiate" | "wait" | "liquidate";

export interface PositionView {
  readonly borrower: Principal;
  readonly collateral: Amount;
  readonly healthFactor: bigint;
  readonly canLiquidate: boolean;
  readonly status: PositionStatus;
  /** Ticks until the window opens (cooldown) or closes (window); else 0 */
  readonly ticksRemaining: Tick;
  readonly liquidatable: LiquidatableAmount;
  readonly action: PositionAction;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type LendingErrorCode =
  | "INSUFFICIENT_APPROVAL"
  | "INSUFFICIENT_COLLATERAL"
  | "INVALID_HEALTH_FACTOR";

export class LendingError extends Error {
  public readonly code: LendingErrorCode;

  constructor(code: LendingErrorCode, message: string) {
    super(message);
    this.name = "LendingError";
    this.code = code;
  }
}
