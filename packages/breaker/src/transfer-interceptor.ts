/**
 * @breakwater/breaker: Transfer interceptor.
 *
 * The MovementGuard installed on the wrapped ledger. Every balance change
 * passes through `inspect` before anything is written:
 *
 * 1. zero amount             → passthrough, the record is untouched
 * 2. mint or burn            → passthrough
 * 3. owner moves own balance → passthrough
 * 4. same-tick deposit pull  → passthrough
 * 5. anything else is a seizure and must fit inside an open window's ceiling
 *
 * An authorised seizure returns an effect that clears the record in the
 * same commit as the balance change.
 */

import type { Amount, LiquidatableAmount, Principal, Tick } from "@breakwater/types";
import { isZeroPrincipal } from "@breakwater/ledger";
import type { BalanceMovement, MovementEffect, MovementGuard } from "@breakwater/ledger";
import type { DepositClassifier } from "./deposit-classifier.js";
import type { LiquidationStateMachine } from "./liquidation-state.js";
import type { Clock } from "./tick-clock.js";
import { BreakerError } from "./types.js";

export type InterceptDecision =
  | { readonly kind: "empty" }
  | { readonly kind: "mint-or-burn" }
  | { readonly kind: "push" }
  | { readonly kind: "deposit"; readonly approvedAt: Tick }
  | { readonly kind: "seizure" };

/**
 * Record of a seizure that committed.
 */
export interface SeizureReceipt {
  readonly principal: Principal;
  readonly spender: Principal;
  readonly recipient: Principal;
  readonly amount: Amount;
  readonly percentage: bigint;
  readonly ceiling: Amount;
  readonly tick: Tick;
}

export interface TransferInterceptorOptions {
  readonly classifier: DepositClassifier;
  readonly stateMachine: LiquidationStateMachine;
  readonly clock: Clock;
  /** Current ceiling for a principal */
  readonly ceiling: (principal: Principal) => LiquidatableAmount;
  /** Called from the commit effect of every executed seizure. Must not throw. */
  readonly onSeizure?: ((receipt: SeizureReceipt) => void) | undefined;
}

export class TransferInterceptor implements MovementGuard {
  constructor(private readonly options: TransferInterceptorOptions) {}

  decide(movement: BalanceMovement): InterceptDecision {
    if (movement.amount === 0n) {
      return { kind: "empty" };
    }
    if (isZeroPrincipal(movement.from) || isZeroPrincipal(movement.to)) {
      return { kind: "mint-or-burn" };
    }
    if (movement.mover === movement.from) {
      return { kind: "push" };
    }
    const classification = this.options.classifier.classify(movement.from, movement.mover);
    if (classification.kind === "owner-initiated-deposit") {
      return { kind: "deposit", approvedAt: classification.approvedAt };
    }
    return { kind: "seizure" };
  }

  inspect(movement: BalanceMovement): MovementEffect | undefined {
    if (this.decide(movement).kind !== "seizure") {
      return undefined;
    }

    const principal = movement.from;
    this.options.stateMachine.requireWindow(principal);

    const { percentage, amount: ceiling } = this.options.ceiling(principal);
    if (movement.amount > ceiling) {
      throw new BreakerError(
        "EXCEEDS_LIMIT",
        `Seizure of ${movement.amount.toString()} from ${principal} exceeds the current ceiling of ${ceiling.toString()} (${percentage.toString()}%)`,
        {
          principal,
          requested: movement.amount.toString(),
          ceiling: ceiling.toString(),
          percentage: percentage.toString(),
        },
      );
    }

    const receipt: SeizureReceipt = {
      principal,
      spender: movement.mover,
      recipient: movement.to,
      amount: movement.amount,
      percentage,
      ceiling,
      tick: this.options.clock.now(),
    };

    return () => {
      this.options.stateMachine.clear(principal);
      this.options.onSeizure?.(receipt);
    };
  }
}
