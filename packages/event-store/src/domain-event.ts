/**
 * @breakwater/event-store: DomainEvent construction.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventMetadata, Tick } from "@breakwater/types";

export interface CreateEventOptions {
  readonly source: EventMetadata["source"];
  readonly actor: string;
  readonly tick: Tick;
  /** Defaults to a fresh UUID */
  readonly correlationId?: string | undefined;
}

/**
 * Build a DomainEvent stamped with a fresh ID and the current wall-clock time.
 * Payload values must already be JSON-safe.
 */
export function createDomainEvent(
  type: string,
  payload: Readonly<Record<string, string>>,
  options: CreateEventOptions,
): DomainEvent {
  return {
    type,
    metadata: {
      eventId: randomUUID(),
      timestamp: new Date().toISOString(),
      tick: options.tick.toString(),
      actor: options.actor,
      correlationId: options.correlationId ?? randomUUID(),
      source: options.source,
    },
    payload,
  };
}
