/**
 * @breakwater/ledger: Core TokenLedger class.
 *
 * Balance and allowance bookkeeping for a fungible token.
 *
 * API surface:
 * - balanceOf() / allowance() / totalSupply: reads
 * - approve(): set an allowance
 * - mint() / burn(): supply changes (custody only)
 * - transfer(): push from the caller's own balance
 * - transferFrom(): pull on behalf of an owner, consuming allowance
 * - snapshot(): serialize the entire ledger state
 *
 * Every balance change is offered to the MovementGuard first.
 * Nothing is written until the guard and all checks have passed.
 */

import type { Amount, Principal } from "@breakwater/types";
import { isZeroPrincipal, toPrincipal, ZERO_PRINCIPAL } from "./principal.js";
import { assertAmount } from "./token-math.js";
import type {
  AllowanceLine,
  BalanceLine,
  BalanceMovement,
  LedgerSnapshot,
  MovementGuard,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Allowance that is never decremented.
 */
export const MAX_ALLOWANCE: Amount = 2n ** 256n - 1n;

export interface TokenLedgerOptions {
  /** Consulted before every balance change */
  readonly guard?: MovementGuard | undefined;
}

/**
 * Fungible token ledger.
 *
 * Invariant: the sum of all balances equals totalSupply.
 */
export class TokenLedger {
  private readonly _balances = new Map<Principal, Amount>();
  private readonly _allowances = new Map<Principal, Map<Principal, Amount>>();
  private readonly _guard: MovementGuard | undefined;
  private _totalSupply: Amount = 0n;

  constructor(options?: TokenLedgerOptions) {
    this._guard = options?.guard;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(holder: Principal): Amount {
    return this._balances.get(toPrincipal(holder)) ?? 0n;
  }

  allowance(owner: Principal, spender: Principal): Amount {
    return this._allowances.get(toPrincipal(owner))?.get(toPrincipal(spender)) ?? 0n;
  }

  get totalSupply(): Amount {
    return this._totalSupply;
  }

  // ─── Allowances ──────────────────────────────────────────────────────

  /**
   * Set `spender`'s allowance over `owner`'s balance. Replaces any previous value.
   */
  approve(owner: Principal, spender: Principal, amount: Amount): void {
    const o = this._requireAccount(owner, "owner");
    const s = this._requireAccount(spender, "spender");
    assertAmount(amount);

    let grants = this._allowances.get(o);
    if (grants === undefined) {
      grants = new Map();
      this._allowances.set(o, grants);
    }
    if (amount === 0n) {
      grants.delete(s);
    } else {
      grants.set(s, amount);
    }
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  mint(to: Principal, amount: Amount): void {
    const recipient = this._requireAccount(to, "recipient");
    this._move({ from: ZERO_PRINCIPAL, to: recipient, mover: recipient, amount });
  }

  burn(from: Principal, amount: Amount): void {
    const holder = this._requireAccount(from, "holder");
    this._move({ from: holder, to: ZERO_PRINCIPAL, mover: holder, amount });
  }

  // ─── Movements ───────────────────────────────────────────────────────

  /**
   * Move `amount` from the caller's own balance.
   */
  transfer(caller: Principal, to: Principal, amount: Amount): void {
    const from = this._requireAccount(caller, "sender");
    const recipient = this._requireAccount(to, "recipient");
    this._move({ from, to: recipient, mover: from, amount });
  }

  /**
   * Move `amount` out of `from` on behalf of `spender`.
   *
   * Check order: allowance, guard, balance. The allowance is
   * consumed only if the whole movement commits.
   */
  transferFrom(spender: Principal, from: Principal, to: Principal, amount: Amount): void {
    const mover = this._requireAccount(spender, "spender");
    const owner = this._requireAccount(from, "owner");
    const recipient = this._requireAccount(to, "recipient");
    assertAmount(amount);

    const current = this.allowance(owner, mover);
    if (current < amount) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `Allowance of ${mover} over ${owner} is ${current.toString()}, needs ${amount.toString()}`,
      );
    }

    this._move({ from: owner, to: recipient, mover, amount }, () => {
      if (current !== MAX_ALLOWANCE) {
        this.approve(owner, mover, current - amount);
      }
    });
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    const balances: BalanceLine[] = [...this._balances.entries()]
      .filter(([, balance]) => balance > 0n)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([holder, balance]) => ({ holder, balance: balance.toString() }));

    const allowances: AllowanceLine[] = [];
    for (const [owner, grants] of this._allowances) {
      for (const [spender, allowance] of grants) {
        allowances.push({ owner, spender, allowance: allowance.toString() });
      }
    }
    allowances.sort(
      (a, b) => a.owner.localeCompare(b.owner) || a.spender.localeCompare(b.spender),
    );

    return {
      version: 1,
      totalSupply: this._totalSupply.toString(),
      balances,
      allowances,
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _requireAccount(value: Principal, label: string): Principal {
    const principal = toPrincipal(value);
    if (isZeroPrincipal(principal)) {
      throw new LedgerError("INVALID_PRINCIPAL", `The zero principal cannot be a ${label}`);
    }
    return principal;
  }

  private _move(movement: BalanceMovement, consumeAllowance?: () => void): void {
    assertAmount(movement.amount);

    const effect = this._guard?.inspect(movement);

    const minting = isZeroPrincipal(movement.from);
    const burning = isZeroPrincipal(movement.to);

    if (!minting) {
      const available = this._balances.get(movement.from) ?? 0n;
      if (available < movement.amount) {
        throw new LedgerError(
          "INSUFFICIENT_BALANCE",
          `Balance of ${movement.from} is ${available.toString()}, needs ${movement.amount.toString()}`,
        );
      }
    }

    // All checks passed: commit
    consumeAllowance?.();

    if (minting) {
      this._totalSupply += movement.amount;
    } else {
      this._credit(movement.from, -movement.amount);
    }

    if (burning) {
      this._totalSupply -= movement.amount;
    } else {
      this._credit(movement.to, movement.amount);
    }

    effect?.();
  }

  private _credit(holder: Principal, delta: Amount): void {
    const next = (this._balances.get(holder) ?? 0n) + delta;
    if (next === 0n) {
      this._balances.delete(holder);
    } else {
      this._balances.set(holder, next);
    }
  }
}
