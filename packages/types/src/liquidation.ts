/**
 * Liquidation Types
 *
 * Primitives for the per-principal circuit breaker.
 *
 * Rules:
 * - Ticks and amounts are bigint (floor division is load-bearing)
 * - A record is immutable; the state machine replaces or deletes it
 * - Phases are derived from ticks, never stored
 */

/**
 * A principal is an EVM-style account address ("0x" + 40 hex chars).
 * Stored in checksummed form.
 */
export type Principal = `0x${string}`;

/**
 * Discrete unit of global time. Monotonically non-decreasing,
 * shared by every principal.
 */
export type Tick = bigint;

/**
 * Token amount in base units.
 */
export type Amount = bigint;

/**
 * Active liquidation for one principal.
 *
 * Invariant: windowEnd === blockedUntil + windowDuration.
 */
export interface LiquidationRecord {
  /** First tick at which a seizure may execute */
  readonly blockedUntil: Tick;

  /** Last tick (inclusive) at which a seizure may execute */
  readonly windowEnd: Tick;

  /** Seizure base captured at initiation */
  readonly snapshotAmount: Amount;
}

/** Phase discriminator. */
export type LiquidationPhaseKind =
  | "no-liquidation"
  | "cooldown"
  | "execution-window"
  | "expired";

/**
 * Phase of a principal's liquidation at a given tick.
 * Discriminated by `kind`.
 */
export type LiquidationPhase =
  | { readonly kind: "no-liquidation" }
  | {
      readonly kind: "cooldown";
      readonly record: LiquidationRecord;
      /** Ticks until the window opens */
      readonly ticksRemaining: Tick;
    }
  | {
      readonly kind: "execution-window";
      readonly record: LiquidationRecord;
      /** Ticks since blockedUntil */
      readonly elapsed: Tick;
      /** Ticks left before windowEnd (0 on the last tick) */
      readonly ticksRemaining: Tick;
    }
  | { readonly kind: "expired"; readonly record: LiquidationRecord };

/**
 * Current seizure ceiling. Both fields are zero outside an execution window.
 */
export interface LiquidatableAmount {
  /** Integer percentage of the snapshot, 0..100 */
  readonly percentage: bigint;
  readonly amount: Amount;
}

/**
 * How a third-party pull was classified.
 */
export type PullClassification =
  | {
      readonly kind: "owner-initiated-deposit";
      /** Tick of the allowance grant that made this a deposit */
      readonly approvedAt: Tick;
    }
  | { readonly kind: "third-party-seizure-attempt" };
