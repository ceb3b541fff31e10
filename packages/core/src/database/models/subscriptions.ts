import { Kysely } from "kysely";
import { db } from "../database";
import { Database, SubscriptionRow } from "../types";
import { Subscription } from "../../types/ledger";
import { isSubscriptionTier } from "../../validation";

function toSubscription(row: SubscriptionRow): Subscription {
  if (!isSubscriptionTier(row.tier)) {
    throw new Error(`Unknown subscription tier "${row.tier}" for ${row.id}`);
  }
  return {
    id: row.id,
    subscriber: row.subscriber,
    tier: row.tier,
    queriesRemaining: Number(row.queries_remaining),
    validUntil: row.valid_until.getTime(),
    totalQueriesUsed: row.total_queries_used,
    pricePaid: BigInt(row.price_paid),
    createdAt: row.created_at.getTime(),
  };
}

export async function findSubscriptionById(
  id: string,
  executor: Kysely<Database> = db
): Promise<Subscription | undefined> {
  const row = await executor
    .selectFrom("subscriptions")
    .where("id", "=", id)
    .selectAll()
    .executeTakeFirst();
  return row ? toSubscription(row) : undefined;
}

export async function saveSubscription(
  subscription: Subscription,
  executor: Kysely<Database> = db
): Promise<void> {
  const values = {
    id: subscription.id,
    subscriber: subscription.subscriber,
    tier: subscription.tier,
    queries_remaining: String(subscription.queriesRemaining),
    valid_until: new Date(subscription.validUntil),
    total_queries_used: subscription.totalQueriesUsed,
    price_paid: subscription.pricePaid.toString(),
    created_at: new Date(subscription.createdAt),
  };
  await executor
    .insertInto("subscriptions")
    .values(values)
    .onConflict((oc) =>
      oc.column("id").doUpdateSet({
        queries_remaining: values.queries_remaining,
        total_queries_used: values.total_queries_used,
      })
    )
    .execute();
}

export async function listSubscriptionsBySubscriber(
  subscriber: string,
  executor: Kysely<Database> = db
): Promise<Subscription[]> {
  const rows = await executor
    .selectFrom("subscriptions")
    .where("subscriber", "=", subscriber)
    .selectAll()
    .orderBy("created_at", "desc")
    .execute();
  return rows.map(toSubscription);
}
