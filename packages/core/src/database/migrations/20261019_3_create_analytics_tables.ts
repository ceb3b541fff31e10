import { Kysely, sql } from "kysely";

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable("provider_analytics")
    .ifNotExists()
    .addColumn("provider", "varchar(42)", (col) => col.primaryKey())
    .addColumn("total_matches_submitted", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_matches_verified", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("matches_scheduled", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("matches_completed", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_revenue_earned", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .addColumn("total_queries_served", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("average_revenue_per_match", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .addColumn("highest_earning_match_revenue", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .addColumn("win_count", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("loss_count", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("draw_count", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("win_rate", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("first_match_at", "timestamptz")
    .addColumn("last_match_at", "timestamptz")
    .execute();

  await db.schema
    .createTable("consumer_analytics")
    .ifNotExists()
    .addColumn("consumer", "varchar(42)", (col) => col.primaryKey())
    .addColumn("total_queries_made", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("paid_queries", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("subscribed_queries", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("unique_matches_queried", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_spent", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .addColumn("average_cost_per_query", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .addColumn("active_subscription_id", "uuid")
    .addColumn("subscription_tier", "varchar(20)")
    .addColumn("first_query_at", "timestamptz")
    .addColumn("last_query_at", "timestamptz")
    .addColumn("member_since", "timestamptz")
    .execute();

  await db.schema
    .createTable("consumer_match_queries")
    .ifNotExists()
    .addColumn("consumer", "varchar(42)", (col) => col.notNull())
    .addColumn("match_result_id", "uuid", (col) => col.notNull().references("match_results.id"))
    .addColumn("created_at", "timestamptz", (col) => col.notNull().defaultTo(sql`now()`))
    .addPrimaryKeyConstraint("consumer_match_queries_pkey", ["consumer", "match_result_id"])
    .execute();

  await db.schema
    .createTable("protocol_analytics")
    .ifNotExists()
    .addColumn("id", "integer", (col) => col.primaryKey())
    .addColumn("total_matches_scheduled", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_matches_completed", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_matches_verified", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_queries_processed", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("paid_queries", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("subscribed_queries", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_protocol_revenue", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .addColumn("total_provider_payouts", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .addColumn("total_validator_rewards", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .addColumn("total_providers", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_consumers", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("basic_subscribers", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("pro_subscribers", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("enterprise_subscribers", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("subscription_revenue", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .execute();

  await sql`INSERT INTO protocol_analytics (id) VALUES (1) ON CONFLICT (id) DO NOTHING`.execute(db);

  // Leaderboard ordering
  await sql`CREATE INDEX IF NOT EXISTS idx_provider_analytics_revenue ON provider_analytics ((CAST(total_revenue_earned AS NUMERIC)) DESC)`.execute(db);
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable("consumer_match_queries").ifExists().execute();
  await db.schema.dropTable("consumer_analytics").ifExists().execute();
  await db.schema.dropTable("provider_analytics").ifExists().execute();
  await db.schema.dropTable("protocol_analytics").ifExists().execute();
}
