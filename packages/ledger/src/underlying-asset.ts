/**
 * @breakwater/ledger: In-memory underlying asset.
 *
 * A plain ERC-20-style asset backed by an unguarded TokenLedger.
 * Stands in for the externally custodied asset in tests, the demo
 * and development nodes. Exposes a faucet `mint`.
 */

import type { Amount, Principal, UnderlyingAsset } from "@breakwater/types";
import { TokenLedger } from "./token-ledger.js";

export interface UnderlyingAssetOptions {
  readonly symbol: string;
  readonly decimals: number;
}

export class InMemoryUnderlyingAsset implements UnderlyingAsset {
  readonly symbol: string;
  readonly decimals: number;
  private readonly _ledger = new TokenLedger();

  constructor(options: UnderlyingAssetOptions) {
    this.symbol = options.symbol;
    this.decimals = options.decimals;
  }

  balanceOf(holder: Principal): Amount {
    return this._ledger.balanceOf(holder);
  }

  allowance(owner: Principal, spender: Principal): Amount {
    return this._ledger.allowance(owner, spender);
  }

  get totalSupply(): Amount {
    return this._ledger.totalSupply;
  }

  approve(owner: Principal, spender: Principal, amount: Amount): void {
    this._ledger.approve(owner, spender, amount);
  }

  transfer(from: Principal, to: Principal, amount: Amount): void {
    this._ledger.transfer(from, to, amount);
  }

  transferFrom(spender: Principal, from: Principal, to: Principal, amount: Amount): void {
    this._ledger.transferFrom(spender, from, to, amount);
  }

  /** Faucet. */
  mint(to: Principal, amount: Amount): void {
    this._ledger.mint(to, amount);
  }
}
