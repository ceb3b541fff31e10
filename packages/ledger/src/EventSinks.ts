import { LedgerEvent } from "@matchproof/core";
import { LedgerEventSink } from "./interfaces/ILedgerEventSink";
import log from "./logger";

/** Keeps every event in order. */
export class MemoryEventSink implements LedgerEventSink {
  readonly events: LedgerEvent[] = [];

  async publish(event: LedgerEvent): Promise<void> {
    this.events.push(event);
  }

  ofType<T extends LedgerEvent["type"]>(type: T): Extract<LedgerEvent, { type: T }>[] {
    return this.events.filter(
      (e): e is Extract<LedgerEvent, { type: T }> => e.type === type
    );
  }
}

/**
 * Publishes each event to every sink, in order. A sink that throws is logged
 * and skipped; the rest still receive the event.
 */
export class FanoutEventSink implements LedgerEventSink {
  private readonly sinks: LedgerEventSink[];

  constructor(...sinks: LedgerEventSink[]) {
    this.sinks = sinks;
  }

  async publish(event: LedgerEvent): Promise<void> {
    for (const sink of this.sinks) {
      try {
        await sink.publish(event);
      } catch (err) {
        log.error({ err, type: event.type }, "Event sink failed");
      }
    }
  }
}

export const nullEventSink: LedgerEventSink = {
  async publish() {},
};
