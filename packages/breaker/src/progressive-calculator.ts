/**
 * @breakwater/breaker: Progressive seizure ceiling.
 *
 * Pure functions. All arithmetic is bigint; every division floors.
 *
 *   basePct = 10 + 90 * elapsed / W
 *   cap     = 50 / 70 / 100 by wallet-to-collateral ratio, rising to 100 across the window
 *   pct     = min(basePct, cap), clamped to [0, 100]
 *   amount  = snapshot * pct / 100
 */

import type { Amount, LiquidatableAmount, LiquidationRecord, Tick } from "@breakwater/types";

export const BASE_PERCENTAGE = 10n;
export const FULL_PERCENTAGE = 100n;

export const NOTHING_LIQUIDATABLE: LiquidatableAmount = { percentage: 0n, amount: 0n };

export interface CeilingInput {
  /** Absent when no liquidation is in progress */
  readonly record: LiquidationRecord | undefined;
  readonly now: Tick;
  readonly windowDuration: Tick;
  /** Principal's underlying balance held outside custody */
  readonly walletBalance: Amount;
  /** Collateral the lending protocol currently attributes to the principal */
  readonly collateral: Amount;
}

/**
 * Percentage of the snapshot that may be seized at `elapsed` ticks into the window,
 * before any wallet-based cap.
 */
export function basePercentage(elapsed: Tick, windowDuration: Tick): bigint {
  return BASE_PERCENTAGE + ((FULL_PERCENTAGE - BASE_PERCENTAGE) * elapsed) / windowDuration;
}

/**
 * Wallet-aware cap. A principal holding underlying outside the protocol is
 * seized more slowly early in the window; the cap opens to 100 by its end.
 */
export function walletCap(
  walletBalance: Amount,
  collateral: Amount,
  elapsed: Tick,
  windowDuration: Tick,
): bigint {
  if (walletBalance <= 0n || collateral <= 0n) {
    return FULL_PERCENTAGE;
  }

  const ratio = (walletBalance * 100n) / collateral;
  const baseCap = ratio >= 100n ? 50n : ratio >= 50n ? 70n : FULL_PERCENTAGE;
  if (baseCap >= FULL_PERCENTAGE) {
    return FULL_PERCENTAGE;
  }
  return baseCap + ((FULL_PERCENTAGE - baseCap) * elapsed) / windowDuration;
}

export function computeLiquidatableAmount(input: CeilingInput): LiquidatableAmount {
  const { record, now, windowDuration } = input;
  if (record === undefined || record.blockedUntil === 0n) {
    return NOTHING_LIQUIDATABLE;
  }
  if (now < record.blockedUntil || now > record.windowEnd) {
    return NOTHING_LIQUIDATABLE;
  }

  const elapsed = now - record.blockedUntil;
  const base = basePercentage(elapsed, windowDuration);
  const cap = walletCap(input.walletBalance, input.collateral, elapsed, windowDuration);
  const percentage = clamp(base < cap ? base : cap, 0n, FULL_PERCENTAGE);

  return {
    percentage,
    amount: (record.snapshotAmount * percentage) / FULL_PERCENTAGE,
  };
}

function clamp(value: bigint, min: bigint, max: bigint): bigint {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}
