/**
 * Event log writer: in-process append-only store.
 *
 * Every committed mutation appends one event. The log joins engine
 * transactions, so a rolled-back operation leaves no event behind.
 */

import { systemClock, type Checkpointable, type Clock, type Restore } from "@emberstake/ledger-client";
import type { EventEnvelope, EventPayloads, EventType } from "./schemas.js";

export interface TypedEvent<K extends EventType = EventType> extends EventEnvelope {
  type: K;
  payload: EventPayloads[K];
}

export class EventLog implements Checkpointable {
  private events: EventEnvelope[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  append<K extends EventType>(type: K, payload: EventPayloads[K]): TypedEvent<K> {
    const event: TypedEvent<K> = {
      seq: this.events.length + 1,
      type,
      timestamp: this.clock.now(),
      payload,
    };
    this.events.push(event);
    return event;
  }

  getEvents(fromSeq: number = 0): EventEnvelope[] {
    return this.events.filter((e) => e.seq >= fromSeq);
  }

  getEventsByType<K extends EventType>(type: K): TypedEvent<K>[] {
    // Only append() writes, so the type tag always matches the payload.
    return this.events.filter((e): e is TypedEvent<K> => e.type === type);
  }

  getEventCount(): number {
    return this.events.length;
  }

  checkpoint(): Restore {
    const length = this.events.length;
    return () => {
      this.events = this.events.slice(0, length);
    };
  }
}
