import Redis from "ioredis";
import { LedgerEvent, publishLedgerEvent } from "@matchproof/core";
import { LedgerEventSink } from "@matchproof/ledger";
import log from "../logger";

/**
 * Fans committed ledger events out over Redis pub/sub. A Redis outage must
 * not fail an operation that has already committed, so publish errors are
 * logged here and not rethrown.
 */
export class RedisEventSink implements LedgerEventSink {
  constructor(private readonly redis: Redis) {}

  async publish(event: LedgerEvent): Promise<void> {
    await publishLedgerEvent(this.redis, event).catch((err: Error) =>
      log.error({ type: event.type, err: err.message }, "Failed to publish ledger event")
    );
  }
}
