/**
 * Collaborator Interfaces
 *
 * Boundaries to systems the breaker consumes but does not own.
 * Both are queried synchronously; the breaker never mutates a target.
 */

import type { Amount, Principal } from "./liquidation.js";

/**
 * Implemented by the lending protocol that holds the collateral claim.
 */
export interface LiquidationTarget {
  /** Whether the principal currently qualifies for liquidation. */
  canLiquidate(principal: Principal): boolean;

  /** Collateral the protocol attributes to the principal, in wrapped units. */
  getUserCollateral(principal: Principal): Amount;
}

/**
 * The externally custodied asset the wrapped token represents 1:1.
 * Implementations throw on failure; callers let the error propagate.
 */
export interface UnderlyingAsset {
  readonly symbol: string;
  readonly decimals: number;

  balanceOf(holder: Principal): Amount;

  /** Move `amount` owned by `from`. */
  transfer(from: Principal, to: Principal, amount: Amount): void;

  /** Move `amount` from `from` on behalf of `spender`, consuming allowance. */
  transferFrom(
    spender: Principal,
    from: Principal,
    to: Principal,
    amount: Amount,
  ): void;
}
