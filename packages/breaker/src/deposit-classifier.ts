/**
 * @breakwater/breaker: Deposit classifier.
 *
 * Tells an owner-initiated deposit apart from a seizure attempt.
 * The only rule: a pull is a deposit when it lands in the same tick as
 * the owner's most recent allowance grant to that spender.
 */

import type { Principal, PullClassification, Tick } from "@breakwater/types";
import type { Clock } from "./tick-clock.js";

export class DepositClassifier {
  /** Last grant tick, keyed by `${owner}:${spender}` */
  private readonly _markers = new Map<string, Tick>();

  constructor(private readonly clock: Clock) {}

  /**
   * Record that `owner` granted `spender` an allowance now.
   * Principals must already be normalised.
   */
  recordApproval(owner: Principal, spender: Principal): Tick {
    const now = this.clock.now();
    this._markers.set(markerKey(owner, spender), now);
    return now;
  }

  lastApproval(owner: Principal, spender: Principal): Tick | undefined {
    return this._markers.get(markerKey(owner, spender));
  }

  classify(owner: Principal, spender: Principal): PullClassification {
    const approvedAt = this.lastApproval(owner, spender);
    if (approvedAt !== undefined && approvedAt === this.clock.now()) {
      return { kind: "owner-initiated-deposit", approvedAt };
    }
    return { kind: "third-party-seizure-attempt" };
  }
}

function markerKey(owner: Principal, spender: Principal): string {
  return `${owner}:${spender}`;
}
