/**
 * @breakwater/breaker: Event streams.
 *
 * One stream per principal and concern.
 */

import type { Principal } from "@breakwater/types";

export function liquidationStream(principal: Principal): string {
  return `liquidation:${principal}`;
}

export function custodyStream(principal: Principal): string {
  return `custody:${principal}`;
}

export function approvalStream(owner: Principal): string {
  return `approval:${owner}`;
}
