import { Kysely } from "kysely";

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable("revenue_entries")
    .ifNotExists()
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("match_result_id", "uuid", (col) => col.notNull().references("match_results.id"))
    .addColumn("match_id", "varchar(255)", (col) => col.notNull())
    .addColumn("provider", "varchar(42)", (col) => col.notNull())
    .addColumn("consumer", "varchar(42)", (col) => col.notNull())
    .addColumn("provider_share", "varchar(78)", (col) => col.notNull())
    .addColumn("protocol_share", "varchar(78)", (col) => col.notNull())
    .addColumn("validator_share", "varchar(78)", (col) => col.notNull())
    .addColumn("created_at", "timestamptz", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("idx_revenue_entries_provider_created")
    .ifNotExists()
    .on("revenue_entries")
    .columns(["provider", "created_at"])
    .execute();

  await db.schema
    .createIndex("idx_revenue_entries_created")
    .ifNotExists()
    .on("revenue_entries")
    .column("created_at")
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable("revenue_entries").ifExists().execute();
}
