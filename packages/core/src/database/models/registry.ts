import { Kysely } from "kysely";
import { db } from "../database";
import { Database, ProtocolAnalyticsRow, RegistryRow } from "../types";
import { ProtocolAnalytics, Registry } from "../../types/ledger";

const SINGLETON_ID = 1;

function toRegistry(row: RegistryRow): Registry {
  return {
    totalMatchesScheduled: row.total_matches_scheduled,
    totalMatchesCompleted: row.total_matches_completed,
    totalQueries: row.total_queries,
    protocolBalance: BigInt(row.protocol_balance),
    validatorPool: BigInt(row.validator_pool),
  };
}

export async function getRegistry(executor: Kysely<Database> = db): Promise<Registry> {
  const row = await executor
    .selectFrom("registry")
    .where("id", "=", SINGLETON_ID)
    .selectAll()
    .executeTakeFirstOrThrow();
  return toRegistry(row);
}

export async function saveRegistry(
  registry: Registry,
  executor: Kysely<Database> = db
): Promise<void> {
  await executor
    .updateTable("registry")
    .set({
      total_matches_scheduled: registry.totalMatchesScheduled,
      total_matches_completed: registry.totalMatchesCompleted,
      total_queries: registry.totalQueries,
      protocol_balance: registry.protocolBalance.toString(),
      validator_pool: registry.validatorPool.toString(),
    })
    .where("id", "=", SINGLETON_ID)
    .execute();
}

function toProtocolAnalytics(row: ProtocolAnalyticsRow): ProtocolAnalytics {
  return {
    totalMatchesScheduled: row.total_matches_scheduled,
    totalMatchesCompleted: row.total_matches_completed,
    totalMatchesVerified: row.total_matches_verified,
    totalQueriesProcessed: row.total_queries_processed,
    paidQueries: row.paid_queries,
    subscribedQueries: row.subscribed_queries,
    totalProtocolRevenue: BigInt(row.total_protocol_revenue),
    totalProviderPayouts: BigInt(row.total_provider_payouts),
    totalValidatorRewards: BigInt(row.total_validator_rewards),
    totalProviders: row.total_providers,
    totalConsumers: row.total_consumers,
    basicSubscribers: row.basic_subscribers,
    proSubscribers: row.pro_subscribers,
    enterpriseSubscribers: row.enterprise_subscribers,
    subscriptionRevenue: BigInt(row.subscription_revenue),
  };
}

export async function getProtocolAnalytics(
  executor: Kysely<Database> = db
): Promise<ProtocolAnalytics> {
  const row = await executor
    .selectFrom("protocol_analytics")
    .where("id", "=", SINGLETON_ID)
    .selectAll()
    .executeTakeFirstOrThrow();
  return toProtocolAnalytics(row);
}

export async function saveProtocolAnalytics(
  analytics: ProtocolAnalytics,
  executor: Kysely<Database> = db
): Promise<void> {
  await executor
    .updateTable("protocol_analytics")
    .set({
      total_matches_scheduled: analytics.totalMatchesScheduled,
      total_matches_completed: analytics.totalMatchesCompleted,
      total_matches_verified: analytics.totalMatchesVerified,
      total_queries_processed: analytics.totalQueriesProcessed,
      paid_queries: analytics.paidQueries,
      subscribed_queries: analytics.subscribedQueries,
      total_protocol_revenue: analytics.totalProtocolRevenue.toString(),
      total_provider_payouts: analytics.totalProviderPayouts.toString(),
      total_validator_rewards: analytics.totalValidatorRewards.toString(),
      total_providers: analytics.totalProviders,
      total_consumers: analytics.totalConsumers,
      basic_subscribers: analytics.basicSubscribers,
      pro_subscribers: analytics.proSubscribers,
      enterprise_subscribers: analytics.enterpriseSubscribers,
      subscription_revenue: analytics.subscriptionRevenue.toString(),
    })
    .where("id", "=", SINGLETON_ID)
    .execute();
}
