import dotenv from "dotenv";
dotenv.config({ quiet: true });

import Redis from "ioredis";
import {
  BlobStore,
  HttpBlobStore,
  MemoryBlobStore,
  closeDb,
  configureDatabase,
  createRedisClient,
  getRecentLedgerEvents,
  migrateToLatest,
} from "@matchproof/core";
import {
  FanoutEventSink,
  Ledger,
  LedgerEventSink,
  LedgerStore,
  MemoryLedgerStore,
  ValidatorAllowlist,
  openVerification,
} from "@matchproof/ledger";
import config from "./config";
import log from "./logger";
import { OracleService } from "./services/OracleService";
import { PostgresLedgerStore } from "./store/PostgresLedgerStore";
import { RedisEventSink } from "./events/RedisEventSink";
import { EventFeed } from "./ws/feed";
import { createHttpWsServer } from "./ws/server";

(async function main() {
  // 1. Ledger storage
  let store: LedgerStore;
  if (config.store === "postgres") {
    await migrateToLatest({ settings: config.database, log });
    configureDatabase(config.database);
    store = new PostgresLedgerStore();
  } else {
    store = new MemoryLedgerStore();
    log.warn("Using in-memory ledger store; state is lost on restart");
  }

  // 2. Event fan-out: WebSocket feed, plus Redis pub/sub when configured
  const feed = new EventFeed();
  const sinks: LedgerEventSink[] = [feed];
  let redis: Redis | null = null;
  if (config.redisUrl) {
    redis = createRedisClient(config.redisUrl);
    redis.on("connect", () => log.info("Redis connected"));
    redis.on("error", (err) => log.error({ err: err.message }, "Redis error"));
    sinks.push(new RedisEventSink(redis));
  }

  // 3. Proof storage
  const blobs: BlobStore = config.blobStoreRemote
    ? new HttpBlobStore({
        publisherUrl: config.blobPublisherUrl,
        aggregatorUrl: config.blobAggregatorUrl,
        epochs: config.blobEpochs,
      })
    : new MemoryBlobStore();
  log.info({ remote: config.blobStoreRemote }, "Blob store initialized");

  // 4. Ledger
  const verificationPolicy =
    config.validatorAddresses.length > 0
      ? new ValidatorAllowlist(config.validatorAddresses)
      : openVerification;
  log.info({ validators: config.validatorAddresses.length || "open" }, "Verification policy set");

  const ledger = new Ledger({
    store,
    events: new FanoutEventSink(...sinks),
    verificationPolicy,
  });
  const oracle = new OracleService(ledger, blobs);

  // 5. Start HTTP + WebSocket server
  const activeRedis = redis;
  const { httpServer } = createHttpWsServer(oracle, feed, {
    storeKind: config.store,
    recentEvents: activeRedis ? () => getRecentLedgerEvents(activeRedis) : undefined,
  });
  httpServer.listen(config.port, () => {
    log.info({ port: config.port, store: config.store }, "HTTP/WS server listening");
  });

  log.info("matchproof oracle started");

  // Graceful shutdown
  const shutdown = async () => {
    log.info("Shutting down...");
    feed.closeAll();
    httpServer.close();
    if (redis) await redis.quit();
    if (config.store === "postgres") await closeDb();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: Error) => {
      log.error({ err: err.message }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
})().catch((err: Error) => {
  log.fatal({ err: err.message }, "Server failed to start");
  process.exit(1);
});
