/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain error codes (BreakerError, LedgerError,
 * LendingError, EventStoreError) to HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Breaker
  NOT_LIQUIDATABLE: 422,
  ALREADY_INITIATED: 409,
  IN_COOLDOWN: 409,
  WINDOW_EXPIRED: 409,
  EXCEEDS_LIMIT: 422,
  MUST_INITIATE_FIRST: 412,
  TARGET_UNBOUND: 412,
  TARGET_ALREADY_BOUND: 409,
  INVALID_CONFIG: 400,
  INVALID_TICKS: 400,

  // Ledger
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  INVALID_AMOUNT: 400,
  INVALID_PRINCIPAL: 400,

  // Lending
  INSUFFICIENT_APPROVAL: 422,
  INSUFFICIENT_COLLATERAL: 422,
  INVALID_HEALTH_FACTOR: 400,

  // Event store
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
};

function errorCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function errorDetails(err: Error): Record<string, unknown> | undefined {
  if ("details" in err && typeof err.details === "object" && err.details !== null) {
    return { ...err.details };
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = errorCode(err);
  const status = code !== undefined ? STATUS_MAP[code] : undefined;

  // Unknown errors don't leak their message
  if (code === undefined || status === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message, errorDetails(err)), status);
}
