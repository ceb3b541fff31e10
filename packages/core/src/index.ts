export * from "./types/ledger";
export * from "./types/events";
export * from "./constants";
export * from "./errors";
export * from "./libs/Encoding";
export * from "./libs/Crypto";
export * from "./libs/BlobStore";
export * from "./libs/MatchProof";
export * from "./libs/Logger";

// Database layer
export * from "./database";

// Validation
export {
  isEvmAddress,
  buildAuthMessage,
  verifySignature,
  validateAuth,
  normalizeAddress,
  isQueryKind,
  isSubscriptionTier,
  parseAmount,
  AUTH_MESSAGE_MAX_AGE_MS,
} from "./validation";
