/**
 * Response views.
 *
 * JSON has no bigint, so ticks, amounts and health factors are
 * rendered as decimal strings.
 */

import type {
  LiquidatableAmount,
  LiquidationPhase,
  LiquidationRecord,
  Principal,
} from "@breakwater/types";
import type { Position, PositionView } from "@breakwater/lending";

export interface RecordView {
  readonly blockedUntil: string;
  readonly windowEnd: string;
  readonly snapshotAmount: string;
}

export interface PhaseView {
  readonly kind: LiquidationPhase["kind"];
  readonly ticksRemaining?: string;
  readonly elapsed?: string;
}

export interface LiquidatableView {
  readonly percentage: string;
  readonly amount: string;
}

export function toRecordView(record: LiquidationRecord): RecordView {
  return {
    blockedUntil: record.blockedUntil.toString(),
    windowEnd: record.windowEnd.toString(),
    snapshotAmount: record.snapshotAmount.toString(),
  };
}

export function toPhaseView(phase: LiquidationPhase): PhaseView {
  switch (phase.kind) {
    case "cooldown":
      return { kind: phase.kind, ticksRemaining: phase.ticksRemaining.toString() };
    case "execution-window":
      return {
        kind: phase.kind,
        elapsed: phase.elapsed.toString(),
        ticksRemaining: phase.ticksRemaining.toString(),
      };
    case "no-liquidation":
    case "expired":
      return { kind: phase.kind };
  }
}

export function toLiquidatableView(value: LiquidatableAmount): LiquidatableView {
  return {
    percentage: value.percentage.toString(),
    amount: value.amount.toString(),
  };
}

export function toPositionView(position: Position) {
  return {
    borrower: position.borrower,
    collateral: position.collateral.toString(),
    healthFactor: position.healthFactor.toString(),
  };
}

export function toMonitorView(view: PositionView) {
  return {
    borrower: view.borrower,
    collateral: view.collateral.toString(),
    healthFactor: view.healthFactor.toString(),
    canLiquidate: view.canLiquidate,
    status: view.status,
    ticksRemaining: view.ticksRemaining.toString(),
    liquidatable: toLiquidatableView(view.liquidatable),
    action: view.action,
  };
}

export function toBalanceView(holder: Principal, balance: bigint) {
  return { holder, balance: balance.toString() };
}
