/**
 * @breakwater/breaker: Configuration and error types.
 *
 * Rules:
 * - Every failure is thrown as a BreakerError; nothing returns error codes
 * - A thrown BreakerError means no state changed
 */

import type { Tick } from "@breakwater/types";

// ─── Configuration ───────────────────────────────────────────────────────

export interface BreakerConfig {
  /**
   * Ticks between initiation and the first tick a seizure may execute.
   * At least 1, so an initiated record never has `blockedUntil` 0.
   */
  readonly cooldownDuration: Tick;

  /** Length of the execution window in ticks. Must be positive. */
  readonly windowDuration: Tick;
}

export const DEFAULT_BREAKER_CONFIG: BreakerConfig = {
  cooldownDuration: 10n,
  windowDuration: 5n,
};

/**
 * Validate a config. The window is a divisor in the ceiling formula,
 * so a zero window is rejected here rather than at seizure time.
 * `blockedUntil` 0 means "no record", so the cooldown must be positive.
 */
export function createBreakerConfig(config: Partial<BreakerConfig> = {}): BreakerConfig {
  const resolved: BreakerConfig = {
    cooldownDuration: config.cooldownDuration ?? DEFAULT_BREAKER_CONFIG.cooldownDuration,
    windowDuration: config.windowDuration ?? DEFAULT_BREAKER_CONFIG.windowDuration,
  };

  if (resolved.cooldownDuration <= 0n) {
    throw new BreakerError(
      "INVALID_CONFIG",
      `cooldownDuration must be > 0, got ${resolved.cooldownDuration.toString()}`,
    );
  }
  if (resolved.windowDuration <= 0n) {
    throw new BreakerError(
      "INVALID_CONFIG",
      `windowDuration must be > 0, got ${resolved.windowDuration.toString()}`,
    );
  }
  return resolved;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type BreakerErrorCategory =
  | "policy-violation"
  | "temporal-guard"
  | "limit-exceeded"
  | "precondition-missing"
  | "invalid-argument";

export type BreakerErrorCode =
  | "NOT_LIQUIDATABLE"
  | "ALREADY_INITIATED"
  | "IN_COOLDOWN"
  | "WINDOW_EXPIRED"
  | "EXCEEDS_LIMIT"
  | "MUST_INITIATE_FIRST"
  | "TARGET_UNBOUND"
  | "TARGET_ALREADY_BOUND"
  | "INVALID_CONFIG"
  | "INVALID_TICKS";

export const ERROR_CATEGORIES: Readonly<Record<BreakerErrorCode, BreakerErrorCategory>> = {
  NOT_LIQUIDATABLE: "policy-violation",
  ALREADY_INITIATED: "policy-violation",
  TARGET_ALREADY_BOUND: "policy-violation",
  IN_COOLDOWN: "temporal-guard",
  WINDOW_EXPIRED: "temporal-guard",
  EXCEEDS_LIMIT: "limit-exceeded",
  MUST_INITIATE_FIRST: "precondition-missing",
  TARGET_UNBOUND: "precondition-missing",
  INVALID_CONFIG: "invalid-argument",
  INVALID_TICKS: "invalid-argument",
};

/**
 * Structured error from the breaker.
 * `details` carries JSON-safe context (ticks and amounts as strings).
 */
export class BreakerError extends Error {
  public readonly code: BreakerErrorCode;
  public readonly category: BreakerErrorCategory;
  public readonly details: Readonly<Record<string, string>> | undefined;

  constructor(code: BreakerErrorCode, message: string, details?: Record<string, string>) {
    super(message);
    this.name = "BreakerError";
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
    this.details = details;
  }
}
