/**
 * Tests for the error handler and body validation.
 *
 * Verifies domain errors are mapped to HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { BreakerError } from "@breakwater/breaker";
import { LendingError } from "@breakwater/lending";
import { handleError } from "../../src/middleware/error-handler.js";
import { createTestApp, jsonRequest, ALICE } from "../setup.js";

function throwingApp(err: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("handleError", () => {
  it("maps a breaker error and carries its details", async () => {
    const app = throwingApp(
      new BreakerError("WINDOW_EXPIRED", "window closed", { principal: ALICE, windowEnd: "15" }),
    );
    const res = await app.request("/boom");

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: {
        code: "WINDOW_EXPIRED",
        message: "window closed",
        details: { principal: ALICE, windowEnd: "15" },
      },
    });
  });

  it("maps a lending error without details", async () => {
    const app = throwingApp(new LendingError("INSUFFICIENT_COLLATERAL", "not enough"));
    const res = await app.request("/boom");

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: { code: "INSUFFICIENT_COLLATERAL", message: "not enough" },
    });
  });

  it("hides the message of an unknown error", async () => {
    const app = throwingApp(new Error("database password is test-secret"));
    const res = await app.request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });

  it("treats an unmapped code as internal", async () => {
    const err = Object.assign(new Error("odd"), { code: "SOMETHING_ELSE" });
    const res = await throwingApp(err).request("/boom");

    expect(res.status).toBe(500);
  });
});

describe("validateBody", () => {
  it("rejects a fractional amount", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/token/deposit", "POST", { amount: "1.5" }, { "X-Principal": ALICE }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request body validation failed",
        details: {
          issues: [{ path: "amount", message: "must be a base-unit integer string" }],
        },
      },
    });
  });

  it("rejects a body that is not JSON", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      new Request("http://localhost/api/v1/token/deposit", {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-Principal": ALICE },
        body: "not json",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Invalid JSON in request body",
    });
  });

  it("rejects a malformed address", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/token/transfer", "POST", { to: "0xabc", amount: "1" }, { "X-Principal": ALICE }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { details: { issues: { path: string }[] } } };
    expect(body.error.details.issues.map((i) => i.path)).toEqual(["to"]);
  });
});
