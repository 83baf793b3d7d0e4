/**
 * @breakwater/lending: Position monitor.
 *
 * Read-only view combining the protocol's position with the token's
 * liquidation phase, and the next action a liquidator could take.
 *
 *   not eligible      → healthy       / none
 *   no record         → liquidatable  / initiate
 *   cooldown          → cooldown      / wait
 *   execution window  → window        / liquidate
 *   window passed     → expired       / initiate
 */

import type { Principal } from "@breakwater/types";
import type { LendingProtocol } from "./lending-protocol.js";
import type { CollateralToken, PositionAction, PositionStatus, PositionView } from "./types.js";

export class PositionMonitor {
  constructor(
    private readonly protocol: LendingProtocol,
    private readonly token: CollateralToken,
  ) {}

  describe(principal: Principal): PositionView {
    const position = this.protocol.position(principal);
    const canLiquidate = this.protocol.canLiquidate(position.borrower);
    const liquidatable = this.token.getLiquidatableAmount(position.borrower);
    const phase = this.token.liquidationPhase(position.borrower);

    let status: PositionStatus;
    let action: PositionAction;
    let ticksRemaining = 0n;

    if (!canLiquidate) {
      status = "healthy";
      action = "none";
    } else {
      switch (phase.kind) {
        case "no-liquidation":
          status = "liquidatable";
          action = "initiate";
          break;
        case "cooldown":
          status = "cooldown";
          action = "wait";
          ticksRemaining = phase.ticksRemaining;
          break;
        case "execution-window":
          status = "window";
          action = liquidatable.percentage > 0n ? "liquidate" : "none";
          ticksRemaining = phase.ticksRemaining;
          break;
        case "expired":
          status = "expired";
          action = "initiate";
          break;
      }
    }

    return {
      borrower: position.borrower,
      collateral: position.collateral,
      healthFactor: position.healthFactor,
      canLiquidate,
      status,
      ticksRemaining,
      liquidatable,
      action,
    };
  }

  /** Every known borrower, in the protocol's order. */
  describeAll(): readonly PositionView[] {
    return this.protocol.borrowers().map((borrower) => this.describe(borrower));
  }
}
