import WebSocket from "ws";
import { LedgerEvent, LedgerEventType, canonicalEncode } from "@matchproof/core";
import { LedgerEventSink } from "@matchproof/ledger";

const EVENT_TYPES: readonly LedgerEventType[] = [
  "match.scheduled",
  "match.locked",
  "result.submitted",
  "result.verified",
  "query.paid",
  "query.subscribed",
  "subscription.created",
];

export function isLedgerEventType(value: string): value is LedgerEventType {
  return EVENT_TYPES.some((type) => type === value);
}

/**
 * Parse a `types=a,b` filter. Unknown names are dropped; an empty result
 * means "everything".
 */
export function parseEventFilter(raw: string | null): Set<LedgerEventType> | null {
  if (!raw) return null;
  const types = raw.split(",").map((t) => t.trim()).filter(isLedgerEventType);
  return types.length > 0 ? new Set(types) : null;
}

export interface FeedSubscriber {
  ws: WebSocket;
  /** null receives every event type */
  types: Set<LedgerEventType> | null;
}

/**
 * Live feed of committed ledger events to WebSocket subscribers.
 */
export class EventFeed implements LedgerEventSink {
  private subscribers = new Set<FeedSubscriber>();

  add(ws: WebSocket, types: Set<LedgerEventType> | null = null): FeedSubscriber {
    const sub: FeedSubscriber = { ws, types };
    this.subscribers.add(sub);
    return sub;
  }

  remove(sub: FeedSubscriber): void {
    this.subscribers.delete(sub);
  }

  size(): number {
    return this.subscribers.size;
  }

  async publish(event: LedgerEvent): Promise<void> {
    const message = canonicalEncode(event);
    for (const sub of this.subscribers) {
      if (sub.types && !sub.types.has(event.type)) continue;
      if (sub.ws.readyState === WebSocket.OPEN) {
        sub.ws.send(message);
      }
    }
  }

  closeAll(): void {
    for (const sub of this.subscribers) {
      if (sub.ws.readyState === WebSocket.OPEN) {
        sub.ws.close();
      }
    }
    this.subscribers.clear();
  }
}
