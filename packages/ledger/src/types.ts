/**
 * @breakwater/ledger: Internal types for the token ledger.
 *
 * Rules:
 * - All exposed types are readonly
 * - Fail-closed: invalid movements throw, never silently succeed
 * - A movement is validated in full before any balance changes
 */

import type { Amount, Principal } from "@breakwater/types";

// ─── Movements ───────────────────────────────────────────────────────────

/**
 * A single balance change about to be applied.
 *
 * `from` is the zero principal for mints, `to` is the zero principal for burns.
 * `mover` is whoever asked for the movement: the owner for a push,
 * the spender for an allowance pull.
 */
export interface BalanceMovement {
  readonly from: Principal;
  readonly to: Principal;
  readonly mover: Principal;
  readonly amount: Amount;
}

/**
 * Side effect to commit together with an approved movement.
 * Must not throw.
 */
export type MovementEffect = () => void;

/**
 * Enforcement hook consulted before every balance change.
 *
 * Throw to veto the movement. Return an effect to have it committed
 * in the same step as the balance change, or undefined for none.
 */
export interface MovementGuard {
  inspect(movement: BalanceMovement): MovementEffect | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface BalanceLine {
  readonly holder: Principal;
  readonly balance: string;
}

export interface AllowanceLine {
  readonly owner: Principal;
  readonly spender: Principal;
  readonly allowance: string;
}

/**
 * Serializable view of the ledger. Lines are sorted, zero lines omitted,
 * so two equal ledgers always produce equal snapshots.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly totalSupply: string;
  readonly balances: readonly BalanceLine[];
  readonly allowances: readonly AllowanceLine[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_AMOUNT"
  | "INVALID_PRINCIPAL";

/**
 * Structured error from the ledger.
 * Always thrown: never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
