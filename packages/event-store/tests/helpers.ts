import type { DomainEvent } from "@breakwater/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
  correlationId = "corr-1",
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      tick: "0",
      actor: "test",
      correlationId,
      source: "breaker",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}
