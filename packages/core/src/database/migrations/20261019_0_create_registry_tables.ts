import { Kysely, sql } from "kysely";

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable("registry")
    .ifNotExists()
    .addColumn("id", "integer", (col) => col.primaryKey())
    .addColumn("total_matches_scheduled", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_matches_completed", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_queries", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("protocol_balance", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .addColumn("validator_pool", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .execute();

  await sql`INSERT INTO registry (id) VALUES (1) ON CONFLICT (id) DO NOTHING`.execute(db);

  await db.schema
    .createTable("account_balances")
    .ifNotExists()
    .addColumn("address", "varchar(42)", (col) => col.primaryKey())
    .addColumn("balance", "varchar(78)", (col) => col.notNull().defaultTo("0"))
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable("account_balances").ifExists().execute();
  await db.schema.dropTable("registry").ifExists().execute();
}
