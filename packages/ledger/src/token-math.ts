/**
 * @breakwater/ledger: Deterministic token arithmetic.
 *
 * Amounts are bigint base units. Human-readable strings are converted
 * by decimal scaling, never through floating point.
 */

import type { Amount } from "@breakwater/types";
import { LedgerError } from "./types.js";

/**
 * Assert an amount is a non-negative bigint.
 */
export function assertAmount(amount: Amount, label = "amount"): void {
  if (typeof amount !== "bigint" || amount < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be a non-negative integer, got: ${String(amount)}`,
    );
  }
}

/**
 * Parse a decimal string into base units.
 *
 * "1.5" with decimals=8 → 150000000n
 * "42" with decimals=0 → 42n
 */
export function parseTokenAmount(amount: string, decimals: number): Amount {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Format base units as a fixed-point decimal string.
 *
 * 150000000n with decimals=8 → "1.50000000"
 */
export function formatTokenAmount(amount: Amount, decimals: number): string {
  assertAmount(amount);
  if (decimals === 0) {
    return amount.toString();
  }

  const str = amount.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}
