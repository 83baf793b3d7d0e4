/**
 * Test helpers for @breakwater/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import type { Principal } from "@breakwater/types";
import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import { DEFAULT_SERVICE_CONFIG } from "../src/services/breaker-service.js";

export const ALICE: Principal = "0x1111111111111111111111111111111111111111";
export const BOB: Principal = "0x2222222222222222222222222222222222222222";
export const LIQUIDATOR: Principal = "0x3333333333333333333333333333333333333333";

/** 0.5 in 18-decimal fixed point */
export const UNHEALTHY = "500000000000000000";

/**
 * Create a test app: cooldown 10 ticks, window 5 ticks, clock at 0.
 */
export function createTestApp(): AppInstance {
  return createApp({ serviceConfig: DEFAULT_SERVICE_CONFIG });
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * POST `body` to `path` as `caller`.
 */
export function postAs(
  instance: AppInstance,
  caller: Principal,
  path: string,
  body: unknown,
): Promise<Response> {
  return Promise.resolve(
    instance.app.request(jsonRequest(path, "POST", body, { "X-Principal": caller })),
  );
}

/**
 * Wrap `amount` underlying for `borrower` and pledge all of it, over HTTP.
 * Runs at the current tick; approvals are stamped with it.
 */
export async function openLoan(
  instance: AppInstance,
  borrower: Principal,
  amount: string,
): Promise<void> {
  const { token, protocol } = instance.service;
  const steps: [string, unknown][] = [
    ["/api/v1/underlying/faucet", { amount }],
    ["/api/v1/underlying/approve", { spender: token.address, amount }],
    ["/api/v1/token/deposit", { amount }],
    ["/api/v1/token/approve", { spender: protocol.address, amount }],
    ["/api/v1/lending/collateral/deposit", { amount }],
  ];
  for (const [path, body] of steps) {
    const res = await postAs(instance, borrower, path, body);
    if (res.status >= 300) {
      throw new Error(`${path} failed with ${res.status}: ${await res.text()}`);
    }
  }
}
