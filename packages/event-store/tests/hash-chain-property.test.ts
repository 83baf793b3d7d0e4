/**
 * Property-based tests for hash chain integrity.
 *
 * 1. Any sequence of appends → valid chain
 * 2. Remove any event → broken chain
 * 3. Modify any payload → broken chain
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";
import type { HashedStoredEvent } from "../src/types.js";
import { makeEvent } from "./helpers.js";

const arbBatch = fc.array(
  fc.record({
    stream: fc.constantFrom("custody:a", "custody:b", "liquidation:a"),
    amount: fc.bigInt({ min: 0n, max: 10n ** 24n }).map((n) => n.toString()),
  }),
  { minLength: 2, maxLength: 12 },
);

function build(batch: readonly { stream: string; amount: string }[]): HashedStoredEvent[] {
  const store = new InMemoryEventStore();
  for (const item of batch) {
    store.append(item.stream, [makeEvent("breaker.custody.deposited", { amount: item.amount })]);
  }
  return [...store.readAll()];
}

describe("hash chain properties", () => {
  it("any sequence of appends verifies", () => {
    fc.assert(
      fc.property(arbBatch, (batch) => {
        const result = verifyHashChain(build(batch));
        expect(result.valid).toBe(true);
        expect(result.lastVerifiedPosition).toBe(batch.length);
      }),
    );
  });

  it("removing any event other than the last breaks the chain", () => {
    fc.assert(
      fc.property(arbBatch, fc.nat(), (batch, seed) => {
        const events = build(batch);
        events.splice(seed % (events.length - 1), 1);
        expect(verifyHashChain(events).valid).toBe(false);
      }),
    );
  });

  it("modifying any payload breaks the chain", () => {
    fc.assert(
      fc.property(arbBatch, fc.nat(), (batch, seed) => {
        const events = build(batch);
        const index = seed % events.length;
        const target = events[index];
        if (target === undefined) return;
        events[index] = {
          ...target,
          event: { ...target.event, payload: { amount: `${target.event.payload["amount"]}1` } },
        };
        expect(verifyHashChain(events).valid).toBe(false);
      }),
    );
  });
});
