/**
 * @breakwater/breaker: Liquidation state machine.
 *
 * Owns the per-principal LiquidationRecord. Phases are derived from the
 * record and the current tick:
 *
 *   no-liquidation → cooldown → execution-window → expired → no-liquidation
 *
 * Rules:
 * - First initiator wins; a record is never extended or shortened
 * - An expired record is inert and is replaced by the next initiation
 * - Collaborators are queried, never mutated
 * - Every check happens before any write
 */

import type {
  LiquidationPhase,
  LiquidationPhaseKind,
  LiquidationRecord,
  LiquidationTarget,
  Principal,
  Tick,
} from "@breakwater/types";
import type { Clock } from "./tick-clock.js";
import type { BreakerConfig, BreakerErrorCode } from "./types.js";
import { BreakerError } from "./types.js";

// =============================================================================
// Transitions
// =============================================================================

export type LiquidationAction = "initiate" | "seize" | "clear";

export type Transition =
  | { readonly to: LiquidationPhaseKind }
  | { readonly reject: BreakerErrorCode };

/**
 * Every (phase, action) pair. A successful seize and a clear both end in
 * no-liquidation; initiating over an expired record restarts the cooldown.
 */
export const TRANSITIONS: Readonly<
  Record<LiquidationPhaseKind, Readonly<Record<LiquidationAction, Transition>>>
> = {
  "no-liquidation": {
    initiate: { to: "cooldown" },
    seize: { reject: "MUST_INITIATE_FIRST" },
    clear: { to: "no-liquidation" },
  },
  cooldown: {
    initiate: { reject: "ALREADY_INITIATED" },
    seize: { reject: "IN_COOLDOWN" },
    clear: { to: "no-liquidation" },
  },
  "execution-window": {
    initiate: { reject: "ALREADY_INITIATED" },
    seize: { to: "no-liquidation" },
    clear: { to: "no-liquidation" },
  },
  expired: {
    initiate: { to: "cooldown" },
    seize: { reject: "WINDOW_EXPIRED" },
    clear: { to: "no-liquidation" },
  },
};

const REJECTION_MESSAGES: Readonly<Record<BreakerErrorCode, string>> = {
  NOT_LIQUIDATABLE: "is not eligible for liquidation",
  ALREADY_INITIATED: "already has a liquidation in progress",
  IN_COOLDOWN: "is still in its liquidation cooldown",
  WINDOW_EXPIRED: "has a liquidation whose execution window has closed",
  EXCEEDS_LIMIT: "cannot be seized for more than the current ceiling",
  MUST_INITIATE_FIRST: "has no liquidation in progress",
  TARGET_UNBOUND: "has no liquidation target bound",
  TARGET_ALREADY_BOUND: "already has a liquidation target bound",
  INVALID_CONFIG: "was given an invalid configuration",
  INVALID_TICKS: "was given an invalid tick count",
};

// =============================================================================
// Phase derivation
// =============================================================================

/**
 * Phase of a record at `now`. An absent record is no-liquidation.
 */
export function phaseOf(record: LiquidationRecord | undefined, now: Tick): LiquidationPhase {
  if (record === undefined) {
    return { kind: "no-liquidation" };
  }
  if (now < record.blockedUntil) {
    return { kind: "cooldown", record, ticksRemaining: record.blockedUntil - now };
  }
  if (now <= record.windowEnd) {
    return {
      kind: "execution-window",
      record,
      elapsed: now - record.blockedUntil,
      ticksRemaining: record.windowEnd - now,
    };
  }
  return { kind: "expired", record };
}

// =============================================================================
// State Machine
// =============================================================================

export class LiquidationStateMachine {
  private readonly _records = new Map<Principal, LiquidationRecord>();

  constructor(
    private readonly config: BreakerConfig,
    private readonly clock: Clock,
  ) {}

  // ─── Reads ─────────────────────────────────────────────────────────────

  record(principal: Principal): LiquidationRecord | undefined {
    return this._records.get(principal);
  }

  phase(principal: Principal): LiquidationPhase {
    return phaseOf(this._records.get(principal), this.clock.now());
  }

  // ─── Transitions ───────────────────────────────────────────────────────

  /**
   * Open a cooldown + window record for `principal`.
   *
   * Eligibility is checked first, then the current phase, then the
   * collateral snapshot is taken. A stale (expired) record is replaced.
   */
  initiate(principal: Principal, target: LiquidationTarget): LiquidationRecord {
    if (!target.canLiquidate(principal)) {
      throw new BreakerError(
        "NOT_LIQUIDATABLE",
        `Principal ${principal} ${REJECTION_MESSAGES.NOT_LIQUIDATABLE}`,
        { principal },
      );
    }

    const phase = this.phase(principal);
    this.assertTransition(principal, phase, "initiate");

    const snapshotAmount = target.getUserCollateral(principal);
    const blockedUntil = this.clock.now() + this.config.cooldownDuration;
    const record: LiquidationRecord = {
      blockedUntil,
      windowEnd: blockedUntil + this.config.windowDuration,
      snapshotAmount,
    };

    this._records.set(principal, record);
    return record;
  }

  /**
   * Assert a seizure may proceed and return the open window.
   * Does not clear the record; the caller commits that with the movement.
   */
  requireWindow(
    principal: Principal,
  ): Extract<LiquidationPhase, { kind: "execution-window" }> {
    const phase = this.phase(principal);
    this.assertTransition(principal, phase, "seize");
    if (phase.kind !== "execution-window") {
      throw new BreakerError("MUST_INITIATE_FIRST", `Principal ${principal} ${REJECTION_MESSAGES.MUST_INITIATE_FIRST}`);
    }
    return phase;
  }

  clear(principal: Principal): void {
    this._records.delete(principal);
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private assertTransition(
    principal: Principal,
    phase: LiquidationPhase,
    action: LiquidationAction,
  ): void {
    const transition = TRANSITIONS[phase.kind][action];
    if ("reject" in transition) {
      throw new BreakerError(
        transition.reject,
        `Principal ${principal} ${REJECTION_MESSAGES[transition.reject]}`,
        phaseDetails(principal, phase),
      );
    }
  }
}

function phaseDetails(principal: Principal, phase: LiquidationPhase): Record<string, string> {
  if (phase.kind === "no-liquidation") {
    return { principal, phase: phase.kind };
  }
  return {
    principal,
    phase: phase.kind,
    blockedUntil: phase.record.blockedUntil.toString(),
    windowEnd: phase.record.windowEnd.toString(),
  };
}
