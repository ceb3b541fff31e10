import { verifyMessage, getAddress } from "ethers";
import { QueryKind, SubscriptionTier } from "./types/ledger";

const EVM_ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const AMOUNT_RE = /^[0-9]{1,30}$/;

/**
 * Returns true if `value` is a valid EVM address (0x followed by 40 hex chars).
 */
export function isEvmAddress(value: string): boolean {
  return EVM_ADDRESS_RE.test(value);
}

/** Maximum age of a signed authentication message (5 minutes). */
export const AUTH_MESSAGE_MAX_AGE_MS = 5 * 60 * 1000;

/**
 * Build the canonical message that clients sign to prove ownership of an EVM address.
 * Both client and server must produce the same string for verification to succeed.
 */
export function buildAuthMessage(address: string, timestamp: number): string {
  return `matchproof authentication for ${address} at ${timestamp}`;
}

/**
 * Verify that `signature` was produced by the private key controlling `claimedAddress`.
 * Uses ethers.verifyMessage (EIP-191 personal_sign) and compares checksummed addresses.
 */
export function verifySignature(
  claimedAddress: string,
  message: string,
  signature: string
): boolean {
  try {
    const recovered = verifyMessage(message, signature);
    return getAddress(recovered) === getAddress(claimedAddress);
  } catch {
    return false;
  }
}

/**
 * Validate a full authentication payload: checks timestamp freshness and signature validity.
 */
export function validateAuth(
  address: string,
  signature: string,
  timestamp: number,
  now: number = Date.now()
): boolean {
  if (Math.abs(now - timestamp) > AUTH_MESSAGE_MAX_AGE_MS) {
    return false;
  }
  const message = buildAuthMessage(address, timestamp);
  return verifySignature(address, message, signature);
}

/** Lower-cased form used as the ledger identity of an address. */
export function normalizeAddress(address: string): string {
  return address.toLowerCase();
}

export function isQueryKind(value: unknown): value is QueryKind {
  return value === "outcome" || value === "stats" || value === "full";
}

export function isSubscriptionTier(value: unknown): value is SubscriptionTier {
  return (
    value === SubscriptionTier.BASIC ||
    value === SubscriptionTier.PRO ||
    value === SubscriptionTier.ENTERPRISE
  );
}

/**
 * Parse a non-negative integer amount of base units from a decimal string or
 * safe integer. Returns null for anything else.
 */
export function parseAmount(value: unknown): bigint | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : null;
  }
  if (typeof value === "string" && AMOUNT_RE.test(value)) {
    return BigInt(value);
  }
  return null;
}
