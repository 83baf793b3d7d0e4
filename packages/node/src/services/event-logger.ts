/**
 * Domain-event logger.
 *
 * Subscribes to the event store and writes one structured line per
 * appended event. Clock steps go to debug; everything else to info.
 */

import type { EventStore, Subscription } from "@breakwater/event-store";
import { BREAKER_EVENTS } from "@breakwater/event-store";

/** The slice of a pino logger this needs. */
export interface EventLogSink {
  info(obj: object, msg: string): void;
  debug(obj: object, msg: string): void;
}

export function subscribeEventLogger(store: EventStore, log: EventLogSink): Subscription {
  return store.subscribeAll((stored) => {
    const entry = {
      type: stored.event.type,
      streamId: stored.streamId,
      position: stored.globalPosition,
      tick: stored.event.metadata.tick,
      actor: stored.event.metadata.actor,
      payload: stored.event.payload,
    };
    if (stored.event.type === BREAKER_EVENTS.CLOCK_ADVANCED) {
      log.debug(entry, stored.event.type);
    } else {
      log.info(entry, stored.event.type);
    }
  });
}
