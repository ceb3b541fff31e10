import { Kysely, sql } from "kysely";
import { db } from "../database";
import { ConsumerAnalyticsRow, Database, ProviderAnalyticsRow } from "../types";
import { ConsumerAnalytics, ProviderAnalytics } from "../../types/ledger";
import { isSubscriptionTier } from "../../validation";

function toDate(ms: number | null): Date | null {
  return ms === null ? null : new Date(ms);
}

function toMs(date: Date | null): number | null {
  return date ? date.getTime() : null;
}

function toProviderAnalytics(row: ProviderAnalyticsRow): ProviderAnalytics {
  return {
    provider: row.provider,
    totalMatchesSubmitted: row.total_matches_submitted,
    totalMatchesVerified: row.total_matches_verified,
    matchesScheduled: row.matches_scheduled,
    matchesCompleted: row.matches_completed,
    totalRevenueEarned: BigInt(row.total_revenue_earned),
    totalQueriesServed: row.total_queries_served,
    averageRevenuePerMatch: BigInt(row.average_revenue_per_match),
    highestEarningMatchRevenue: BigInt(row.highest_earning_match_revenue),
    winCount: row.win_count,
    lossCount: row.loss_count,
    drawCount: row.draw_count,
    winRate: row.win_rate,
    firstMatchAt: toMs(row.first_match_at),
    lastMatchAt: toMs(row.last_match_at),
  };
}

export async function findProviderAnalytics(
  provider: string,
  executor: Kysely<Database> = db
): Promise<ProviderAnalytics | undefined> {
  const row = await executor
    .selectFrom("provider_analytics")
    .where("provider", "=", provider)
    .selectAll()
    .executeTakeFirst();
  return row ? toProviderAnalytics(row) : undefined;
}

export async function saveProviderAnalytics(
  analytics: ProviderAnalytics,
  executor: Kysely<Database> = db
): Promise<void> {
  const values = {
    provider: analytics.provider,
    total_matches_submitted: analytics.totalMatchesSubmitted,
    total_matches_verified: analytics.totalMatchesVerified,
    matches_scheduled: analytics.matchesScheduled,
    matches_completed: analytics.matchesCompleted,
    total_revenue_earned: analytics.totalRevenueEarned.toString(),
    total_queries_served: analytics.totalQueriesServed,
    average_revenue_per_match: analytics.averageRevenuePerMatch.toString(),
    highest_earning_match_revenue: analytics.highestEarningMatchRevenue.toString(),
    win_count: analytics.winCount,
    loss_count: analytics.lossCount,
    draw_count: analytics.drawCount,
    win_rate: analytics.winRate,
    first_match_at: toDate(analytics.firstMatchAt),
    last_match_at: toDate(analytics.lastMatchAt),
  };
  const { provider: _key, ...update } = values;
  await executor
    .insertInto("provider_analytics")
    .values(values)
    .onConflict((oc) => oc.column("provider").doUpdateSet(update))
    .execute();
}

/**
 * Providers ordered by lifetime revenue, then by win rate.
 */
export async function listTopProviders(
  limit: number = 10,
  executor: Kysely<Database> = db
): Promise<ProviderAnalytics[]> {
  const rows = await executor
    .selectFrom("provider_analytics")
    .selectAll()
    .where("total_matches_submitted", ">", 0)
    .orderBy(sql`CAST(total_revenue_earned AS NUMERIC)`, "desc")
    .orderBy("win_rate", "desc")
    .limit(limit)
    .execute();
  return rows.map(toProviderAnalytics);
}

function toConsumerAnalytics(row: ConsumerAnalyticsRow): ConsumerAnalytics {
  const tier = row.subscription_tier;
  if (tier !== null && !isSubscriptionTier(tier)) {
    throw new Error(`Unknown subscription tier "${tier}" for ${row.consumer}`);
  }
  return {
    consumer: row.consumer,
    totalQueriesMade: row.total_queries_made,
    paidQueries: row.paid_queries,
    subscribedQueries: row.subscribed_queries,
    uniqueMatchesQueried: row.unique_matches_queried,
    totalSpent: BigInt(row.total_spent),
    averageCostPerQuery: BigInt(row.average_cost_per_query),
    activeSubscriptionId: row.active_subscription_id,
    subscriptionTier: tier,
    firstQueryAt: toMs(row.first_query_at),
    lastQueryAt: toMs(row.last_query_at),
    memberSince: toMs(row.member_since),
  };
}

export async function findConsumerAnalytics(
  consumer: string,
  executor: Kysely<Database> = db
): Promise<ConsumerAnalytics | undefined> {
  const row = await executor
    .selectFrom("consumer_analytics")
    .where("consumer", "=", consumer)
    .selectAll()
    .executeTakeFirst();
  return row ? toConsumerAnalytics(row) : undefined;
}

export async function saveConsumerAnalytics(
  analytics: ConsumerAnalytics,
  executor: Kysely<Database> = db
): Promise<void> {
  const values = {
    consumer: analytics.consumer,
    total_queries_made: analytics.totalQueriesMade,
    paid_queries: analytics.paidQueries,
    subscribed_queries: analytics.subscribedQueries,
    unique_matches_queried: analytics.uniqueMatchesQueried,
    total_spent: analytics.totalSpent.toString(),
    average_cost_per_query: analytics.averageCostPerQuery.toString(),
    active_subscription_id: analytics.activeSubscriptionId,
    subscription_tier: analytics.subscriptionTier,
    first_query_at: toDate(analytics.firstQueryAt),
    last_query_at: toDate(analytics.lastQueryAt),
    member_since: toDate(analytics.memberSince),
  };
  const { consumer: _key, ...update } = values;
  await executor
    .insertInto("consumer_analytics")
    .values(values)
    .onConflict((oc) => oc.column("consumer").doUpdateSet(update))
    .execute();
}

/**
 * Record that `consumer` queried a result. Returns true the first time the
 * pair is seen.
 */
export async function recordConsumerQuery(
  consumer: string,
  matchResultId: string,
  executor: Kysely<Database> = db
): Promise<boolean> {
  const inserted = await executor
    .insertInto("consumer_match_queries")
    .values({ consumer, match_result_id: matchResultId })
    .onConflict((oc) => oc.columns(["consumer", "match_result_id"]).doNothing())
    .returning("consumer")
    .executeTakeFirst();
  return inserted !== undefined;
}
