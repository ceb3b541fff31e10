import {
  ConsumerAnalytics,
  MatchResult,
  NO_WINNER,
  ProtocolAnalytics,
  ProviderAnalytics,
  Registry,
  Subscription,
  SubscriptionTier,
} from "@matchproof/core";
import { LedgerTx } from "./interfaces/ILedgerStore";

// Aggregates are incremental counters. Nothing here recomputes from history;
// every mutator is called from inside the transaction of the event it counts.

export function emptyRegistry(): Registry {
  return {
    totalMatchesScheduled: 0,
    totalMatchesCompleted: 0,
    totalQueries: 0,
    protocolBalance: 0n,
    validatorPool: 0n,
  };
}

export function emptyProtocolAnalytics(): ProtocolAnalytics {
  return {
    totalMatchesScheduled: 0,
    totalMatchesCompleted: 0,
    totalMatchesVerified: 0,
    totalQueriesProcessed: 0,
    paidQueries: 0,
    subscribedQueries: 0,
    totalProtocolRevenue: 0n,
    totalProviderPayouts: 0n,
    totalValidatorRewards: 0n,
    totalProviders: 0,
    totalConsumers: 0,
    basicSubscribers: 0,
    proSubscribers: 0,
    enterpriseSubscribers: 0,
    subscriptionRevenue: 0n,
  };
}

export function emptyProviderAnalytics(provider: string): ProviderAnalytics {
  return {
    provider,
    totalMatchesSubmitted: 0,
    totalMatchesVerified: 0,
    matchesScheduled: 0,
    matchesCompleted: 0,
    totalRevenueEarned: 0n,
    totalQueriesServed: 0,
    averageRevenuePerMatch: 0n,
    highestEarningMatchRevenue: 0n,
    winCount: 0,
    lossCount: 0,
    drawCount: 0,
    winRate: 0,
    firstMatchAt: null,
    lastMatchAt: null,
  };
}

export function emptyConsumerAnalytics(consumer: string): ConsumerAnalytics {
  return {
    consumer,
    totalQueriesMade: 0,
    paidQueries: 0,
    subscribedQueries: 0,
    uniqueMatchesQueried: 0,
    totalSpent: 0n,
    averageCostPerQuery: 0n,
    activeSubscriptionId: null,
    subscriptionTier: null,
    firstQueryAt: null,
    lastQueryAt: null,
    memberSince: null,
  };
}

/** Whole-percent win rate, truncated. 0 when nothing has been submitted. */
export function computeWinRate(wins: number, submitted: number): number {
  if (submitted === 0) return 0;
  return Math.floor((wins * 100) / submitted);
}

/** Truncating integer mean. 0 when count is 0. */
export function averageOf(total: bigint, count: number): bigint {
  if (count === 0) return 0n;
  return total / BigInt(count);
}

// ---- provider ----

export function recordProviderScheduled(p: ProviderAnalytics): void {
  p.matchesScheduled += 1;
}

export function recordProviderSubmission(
  p: ProviderAnalytics,
  result: MatchResult,
  now: number
): void {
  p.totalMatchesSubmitted += 1;
  p.matchesCompleted += 1;

  if (result.winner === NO_WINNER) {
    p.drawCount += 1;
  } else if (result.winner === result.submitter) {
    p.winCount += 1;
  } else {
    p.lossCount += 1;
  }

  p.winRate = computeWinRate(p.winCount, p.totalMatchesSubmitted);
  p.averageRevenuePerMatch = averageOf(p.totalRevenueEarned, p.totalMatchesSubmitted);
  p.firstMatchAt = p.firstMatchAt ?? now;
  p.lastMatchAt = now;
}

export function recordProviderVerified(p: ProviderAnalytics): void {
  p.totalMatchesVerified += 1;
}

/**
 * A query served from `result`. `revenue` is the provider share (0 for a
 * subscribed query); `result` must already carry the updated revenueEarned.
 */
export function recordProviderQuery(
  p: ProviderAnalytics,
  result: MatchResult,
  revenue: bigint
): void {
  p.totalQueriesServed += 1;
  p.totalRevenueEarned += revenue;
  p.averageRevenuePerMatch = averageOf(p.totalRevenueEarned, p.totalMatchesSubmitted);
  if (result.revenueEarned > p.highestEarningMatchRevenue) {
    p.highestEarningMatchRevenue = result.revenueEarned;
  }
}

// ---- consumer ----

export function recordConsumerQuery(
  c: ConsumerAnalytics,
  cost: bigint,
  firstQueryOfMatch: boolean,
  now: number
): void {
  c.totalQueriesMade += 1;
  if (cost > 0n) {
    c.paidQueries += 1;
  } else {
    c.subscribedQueries += 1;
  }
  if (firstQueryOfMatch) {
    c.uniqueMatchesQueried += 1;
  }
  c.totalSpent += cost;
  c.averageCostPerQuery = averageOf(c.totalSpent, c.totalQueriesMade);
  c.firstQueryAt = c.firstQueryAt ?? now;
  c.lastQueryAt = now;
  c.memberSince = c.memberSince ?? now;
}

export function recordConsumerSubscription(
  c: ConsumerAnalytics,
  subscription: Subscription,
  now: number
): void {
  c.activeSubscriptionId = subscription.id;
  c.subscriptionTier = subscription.tier;
  c.memberSince = c.memberSince ?? now;
}

// ---- protocol ----

export function recordProtocolPaidQuery(
  proto: ProtocolAnalytics,
  shares: { provider: bigint; protocol: bigint; validator: bigint }
): void {
  proto.totalQueriesProcessed += 1;
  proto.paidQueries += 1;
  proto.totalProviderPayouts += shares.provider;
  proto.totalProtocolRevenue += shares.protocol;
  proto.totalValidatorRewards += shares.validator;
}

export function recordProtocolSubscribedQuery(proto: ProtocolAnalytics): void {
  proto.totalQueriesProcessed += 1;
  proto.subscribedQueries += 1;
}

export function recordProtocolSubscription(
  proto: ProtocolAnalytics,
  tier: SubscriptionTier,
  price: bigint
): void {
  switch (tier) {
    case SubscriptionTier.BASIC:
      proto.basicSubscribers += 1;
      break;
    case SubscriptionTier.PRO:
      proto.proSubscribers += 1;
      break;
    case SubscriptionTier.ENTERPRISE:
      proto.enterpriseSubscribers += 1;
      break;
  }
  proto.subscriptionRevenue += price;
  proto.totalProtocolRevenue += price;
}

// ---- loading ----

/**
 * Load a provider record, creating an empty one if the address has none.
 * Providers are counted on the protocol aggregate at their first submission.
 */
export async function loadProvider(tx: LedgerTx, provider: string): Promise<ProviderAnalytics> {
  return (await tx.getProviderAnalytics(provider)) ?? emptyProviderAnalytics(provider);
}

/**
 * Load a consumer record. A newly created one is counted on `proto`.
 */
export async function loadConsumer(
  tx: LedgerTx,
  consumer: string,
  proto: ProtocolAnalytics
): Promise<ConsumerAnalytics> {
  const existing = await tx.getConsumerAnalytics(consumer);
  if (existing) return existing;
  proto.totalConsumers += 1;
  return emptyConsumerAnalytics(consumer);
}
