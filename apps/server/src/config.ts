import { readDatabaseSettings } from "@matchproof/core";

function parseList(value: string | undefined): string[] {
  return (value || "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export type StoreKind = "memory" | "postgres";

function parseStoreKind(value: string | undefined): StoreKind {
  return value === "postgres" ? "postgres" : "memory";
}

export default {
  port: parseInt(process.env.PORT || "8080", 10),
  store: parseStoreKind(process.env.LEDGER_STORE),
  database: readDatabaseSettings(),
  // Event fan-out over pub/sub is off unless a Redis URL is given
  redisUrl: process.env.REDIS_URL || "",

  // Verification is open to anyone when no validators are listed
  validatorAddresses: parseList(process.env.VALIDATOR_ADDRESSES),

  // Proof storage (in-process when no publisher is configured)
  blobPublisherUrl: process.env.BLOB_PUBLISHER_URL || "",
  blobAggregatorUrl: process.env.BLOB_AGGREGATOR_URL || "",
  blobEpochs: parseInt(process.env.BLOB_EPOCHS || "5", 10),

  get blobStoreRemote(): boolean {
    return !!(this.blobPublisherUrl && this.blobAggregatorUrl);
  },
};
