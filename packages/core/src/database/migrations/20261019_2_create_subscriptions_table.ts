import { Kysely } from "kysely";

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable("subscriptions")
    .ifNotExists()
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("subscriber", "varchar(42)", (col) => col.notNull())
    .addColumn("tier", "varchar(20)", (col) => col.notNull())
    .addColumn("queries_remaining", "bigint", (col) => col.notNull())
    .addColumn("valid_until", "timestamptz", (col) => col.notNull())
    .addColumn("total_queries_used", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("price_paid", "varchar(78)", (col) => col.notNull())
    .addColumn("created_at", "timestamptz", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("idx_subscriptions_subscriber")
    .ifNotExists()
    .on("subscriptions")
    .column("subscriber")
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable("subscriptions").ifExists().execute();
}
