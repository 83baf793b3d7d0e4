/**
 * Tests for EventCatalog and the Breakwater event definitions.
 */

import { describe, it, expect } from "vitest";
import type { EventSchema } from "../src/catalog.js";
import { EventCatalog, CatalogError } from "../src/catalog.js";
import { BREAKER_EVENTS, createBreakerCatalog } from "../src/breaker-events.js";

function makeSchema(type: string, version = 1): EventSchema {
  return {
    type,
    version,
    description: `Test schema for ${type}`,
    source: "breaker",
    validate: (p) => typeof p === "object" && p !== null && "id" in p,
  };
}

// =============================================================================
// Registration
// =============================================================================

describe("registration", () => {
  it("registers and looks up a schema", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("test.created"));

    expect(catalog.has("test.created")).toBe(true);
    expect(catalog.getSchema("test.created")?.version).toBe(1);
    expect(catalog.size).toBe(1);
  });

  it("treats re-registration of the same version as a no-op", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("test.created"));
    catalog.register(makeSchema("test.created"));
    expect(catalog.size).toBe(1);
  });

  it("rejects a conflicting version", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("test.created", 1));
    expect(() => catalog.register(makeSchema("test.created", 2))).toThrow(CatalogError);
  });

  it("rejects a non-positive version", () => {
    const catalog = new EventCatalog();
    expect(() => catalog.register(makeSchema("test.created", 0))).toThrow(CatalogError);
  });

  it("lists types sorted", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("b.second"));
    catalog.register(makeSchema("a.first"));
    expect(catalog.listTypes()).toEqual(["a.first", "b.second"]);
  });
});

describe("validate", () => {
  it("returns false for unregistered types", () => {
    expect(new EventCatalog().validate("unknown", { id: "1" })).toBe(false);
  });

  it("delegates to the schema", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("test.created"));
    expect(catalog.validate("test.created", { id: "1" })).toBe(true);
    expect(catalog.validate("test.created", {})).toBe(false);
  });
});

// =============================================================================
// Breakwater catalog
// =============================================================================

describe("createBreakerCatalog", () => {
  const catalog = createBreakerCatalog();

  it("registers every event type", () => {
    expect(catalog.size).toBe(Object.keys(BREAKER_EVENTS).length);
    for (const type of Object.values(BREAKER_EVENTS)) {
      expect(catalog.has(type)).toBe(true);
    }
  });

  it("groups events by source", () => {
    expect(catalog.listBySource("breaker")).toHaveLength(5);
    expect(catalog.listBySource("lending")).toHaveLength(4);
    expect(catalog.listBySource("node")).toHaveLength(1);
  });

  it("accepts a well-formed initiation payload", () => {
    expect(
      catalog.validate(BREAKER_EVENTS.LIQUIDATION_INITIATED, {
        principal: "0x1111111111111111111111111111111111111111",
        initiator: "0x2222222222222222222222222222222222222222",
        initiatedAt: "0",
        blockedUntil: "10",
        windowEnd: "15",
        snapshotAmount: "1000",
      }),
    ).toBe(true);
  });

  it("rejects amounts that are not base-unit integer strings", () => {
    expect(
      catalog.validate(BREAKER_EVENTS.CUSTODY_DEPOSITED, {
        principal: "0x1111111111111111111111111111111111111111",
        amount: "1.5",
      }),
    ).toBe(false);
    expect(
      catalog.validate(BREAKER_EVENTS.CUSTODY_DEPOSITED, {
        principal: "0x1111111111111111111111111111111111111111",
        amount: 15,
      }),
    ).toBe(false);
  });

  it("validates clock advances", () => {
    expect(catalog.validate(BREAKER_EVENTS.CLOCK_ADVANCED, { from: "3", to: "4" })).toBe(true);
    expect(catalog.validate(BREAKER_EVENTS.CLOCK_ADVANCED, { from: "3" })).toBe(false);
  });
});
