import { Kysely } from "kysely";

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable("scheduled_matches")
    .ifNotExists()
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("match_id", "varchar(255)", (col) => col.notNull().unique())
    .addColumn("game_id", "varchar(255)", (col) => col.notNull())
    .addColumn("player_a", "varchar(42)", (col) => col.notNull())
    .addColumn("player_b", "varchar(42)", (col) => col.notNull())
    .addColumn("scheduled_time", "timestamptz", (col) => col.notNull())
    .addColumn("state", "varchar(50)", (col) => col.notNull())
    .addColumn("locked", "boolean", (col) => col.notNull().defaultTo(false))
    .addColumn("created_at", "timestamptz", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("match_results")
    .ifNotExists()
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("match_id", "varchar(255)", (col) => col.notNull().unique())
    .addColumn("scheduled_match_id", "uuid", (col) =>
      col.notNull().unique().references("scheduled_matches.id")
    )
    .addColumn("submitter", "varchar(42)", (col) => col.notNull())
    .addColumn("winner", "varchar(42)", (col) => col.notNull())
    .addColumn("stats_a", "text", (col) => col.notNull())
    .addColumn("stats_b", "text", (col) => col.notNull())
    .addColumn("content_blob_id", "varchar(255)", (col) => col.notNull())
    .addColumn("proof_hash", "varchar(66)", (col) => col.notNull())
    .addColumn("verified", "boolean", (col) => col.notNull().defaultTo(false))
    .addColumn("verifier", "varchar(42)")
    .addColumn("query_count", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("revenue_earned", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .addColumn("submitted_at", "timestamptz", (col) => col.notNull())
    .addColumn("verified_at", "timestamptz")
    .execute();

  await db.schema
    .createIndex("idx_match_results_submitter")
    .ifNotExists()
    .on("match_results")
    .columns(["submitter", "submitted_at"])
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable("match_results").ifExists().execute();
  await db.schema.dropTable("scheduled_matches").ifExists().execute();
}
