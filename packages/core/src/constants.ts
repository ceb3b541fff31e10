import { ZeroAddress } from "ethers";
import { SubscriptionTier } from "./types/ledger";

/** Base units per whole token (9 decimals). */
export const UNITS_PER_TOKEN = 1_000_000_000n;

/** Minimum payment for a single paid query (0.05 token). */
export const QUERY_PRICE = 50_000_000n;

/** Winner value recorded for a drawn match. */
export const NO_WINNER = ZeroAddress;

/** Percent of every paid query routed to each party. Sums to 100. */
export const REVENUE_SHARES = {
  provider: 70n,
  protocol: 20n,
  validator: 10n,
} as const;

/** Quota standing in for "unlimited" on the top tier. */
export const UNLIMITED_QUERIES = Number.MAX_SAFE_INTEGER;

export const SUBSCRIPTION_DURATION_MS = 30 * 24 * 60 * 60 * 1000;

export interface TierTerms {
  price: bigint;
  quota: number;
  durationMs: number;
}

export const SUBSCRIPTION_TIERS: Record<SubscriptionTier, TierTerms> = {
  [SubscriptionTier.BASIC]: {
    price: 5n * UNITS_PER_TOKEN,
    quota: 200,
    durationMs: SUBSCRIPTION_DURATION_MS,
  },
  [SubscriptionTier.PRO]: {
    price: 20n * UNITS_PER_TOKEN,
    quota: 1000,
    durationMs: SUBSCRIPTION_DURATION_MS,
  },
  [SubscriptionTier.ENTERPRISE]: {
    price: 100n * UNITS_PER_TOKEN,
    quota: UNLIMITED_QUERIES,
    durationMs: SUBSCRIPTION_DURATION_MS,
  },
};
