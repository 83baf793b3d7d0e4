/**
 * @breakwater/breaker: Custody gateway.
 *
 * Wraps and unwraps the underlying asset 1:1. The custodian account holds
 * every wrapped unit's backing, so custody balance equals wrapped supply.
 * No liquidation logic applies here.
 */

import type { Amount, Principal, UnderlyingAsset } from "@breakwater/types";
import { assertAmount, isZeroPrincipal, LedgerError, toPrincipal } from "@breakwater/ledger";
import type { TokenLedger } from "@breakwater/ledger";

export class CustodyGateway {
  constructor(
    private readonly ledger: TokenLedger,
    private readonly underlying: UnderlyingAsset,
    /** Account that holds the underlying on the wrapper's behalf */
    readonly custodian: Principal,
  ) {}

  /**
   * Pull `amount` underlying from `caller` and mint as many wrapped units.
   * The caller must have approved the custodian on the underlying asset.
   */
  deposit(caller: Principal, amount: Amount): Principal {
    const account = this.requireAccount(caller);
    assertAmount(amount);

    this.underlying.transferFrom(this.custodian, account, this.custodian, amount);
    this.ledger.mint(account, amount);
    return account;
  }

  /**
   * Burn `amount` wrapped units and return as much underlying.
   */
  withdraw(caller: Principal, amount: Amount): Principal {
    const account = this.requireAccount(caller);
    assertAmount(amount);

    const balance = this.ledger.balanceOf(account);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Balance of ${account} is ${balance.toString()}, needs ${amount.toString()}`,
      );
    }

    this.underlying.transfer(this.custodian, account, amount);
    this.ledger.burn(account, amount);
    return account;
  }

  custodyBalance(): Amount {
    return this.underlying.balanceOf(this.custodian);
  }

  private requireAccount(value: Principal): Principal {
    const principal = toPrincipal(value);
    if (isZeroPrincipal(principal)) {
      throw new LedgerError("INVALID_PRINCIPAL", "The zero principal cannot hold wrapped units");
    }
    return principal;
  }
}
