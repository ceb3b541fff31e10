import Redis from "ioredis";
import { canonicalEncode } from "../libs/Encoding";
import { LedgerEvent } from "../types/events";

/**
 * Client for the event fan-out. A rediss:// URL turns on TLS. The caller
 * owns the lifecycle (connect, quit).
 */
export function createRedisClient(url: string): Redis {
  const useTls = url.startsWith("rediss://");

  return new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
    ...(useTls ? { tls: { rejectUnauthorized: false } } : {}),
  });
}

// --- Ledger event fan-out (pub/sub) ---

export const LEDGER_EVENTS_CHANNEL = "ledger:events";

const RECENT_EVENTS_KEY = "ledger:recent";
const RECENT_EVENTS_LIMIT = 100;

/**
 * Publish a committed ledger event and keep it in a capped recent-events list
 * so dashboards can backfill on connect.
 */
export async function publishLedgerEvent(
  r: Redis,
  event: LedgerEvent
): Promise<void> {
  const encoded = canonicalEncode(event);
  await r
    .multi()
    .publish(LEDGER_EVENTS_CHANNEL, encoded)
    .lpush(RECENT_EVENTS_KEY, encoded)
    .ltrim(RECENT_EVENTS_KEY, 0, RECENT_EVENTS_LIMIT - 1)
    .exec();
}

/**
 * Most recent encoded events, newest first.
 */
export async function getRecentLedgerEvents(
  r: Redis,
  limit: number = 20
): Promise<string[]> {
  return r.lrange(RECENT_EVENTS_KEY, 0, Math.min(limit, RECENT_EVENTS_LIMIT) - 1);
}
