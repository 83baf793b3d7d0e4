/**
 * @breakwater/ledger: Principal normalisation.
 *
 * Every principal entering a ledger goes through `toPrincipal`, so map
 * keys are always the checksummed form and two spellings of one address
 * never hold separate balances.
 */

import { getAddress, isAddress, zeroAddress } from "viem";
import type { Principal } from "@breakwater/types";
import { LedgerError } from "./types.js";

/**
 * Mint/burn sentinel. Never holds a balance.
 */
export const ZERO_PRINCIPAL: Principal = zeroAddress;

/**
 * Normalise an address string to its checksummed form.
 * Throws INVALID_PRINCIPAL for anything that is not a 20-byte hex address.
 */
export function toPrincipal(value: string): Principal {
  if (!isAddress(value, { strict: false })) {
    throw new LedgerError("INVALID_PRINCIPAL", `Invalid principal: "${value}"`);
  }
  return getAddress(value);
}

export function isZeroPrincipal(principal: Principal): boolean {
  return principal.toLowerCase() === ZERO_PRINCIPAL;
}
