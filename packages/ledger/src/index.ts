/**
 * @breakwater/ledger: Fungible token ledger.
 *
 * A pure TypeScript balance/allowance ledger:
 * - Sum of balances always equals total supply
 * - Every balance change passes a MovementGuard before it is written
 * - A rejected movement leaves balances and allowances untouched
 * - All arithmetic uses bigint (no floating point)
 *
 * Also ships an in-memory underlying asset for tests and dev nodes.
 */

// Core ledger
export { TokenLedger, MAX_ALLOWANCE } from "./token-ledger.js";
export type { TokenLedgerOptions } from "./token-ledger.js";

// Underlying asset stand-in
export { InMemoryUnderlyingAsset } from "./underlying-asset.js";
export type { UnderlyingAssetOptions } from "./underlying-asset.js";

// Principals
export { toPrincipal, isZeroPrincipal, ZERO_PRINCIPAL } from "./principal.js";

// Token arithmetic
export { assertAmount, parseTokenAmount, formatTokenAmount } from "./token-math.js";

// Types
export type {
  BalanceMovement,
  MovementEffect,
  MovementGuard,
  BalanceLine,
  AllowanceLine,
  LedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
