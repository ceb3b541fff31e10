import { Kysely, sql } from "kysely";
import { db } from "../database";
import { Database } from "../types";

export async function getAccountBalance(
  address: string,
  executor: Kysely<Database> = db
): Promise<bigint> {
  const row = await executor
    .selectFrom("account_balances")
    .where("address", "=", address)
    .select("balance")
    .executeTakeFirst();
  return row ? BigInt(row.balance) : 0n;
}

export async function creditAccount(
  address: string,
  amount: bigint,
  executor: Kysely<Database> = db
): Promise<void> {
  const delta = amount.toString();
  await executor
    .insertInto("account_balances")
    .values({ address, balance: delta })
    .onConflict((oc) =>
      oc.column("address").doUpdateSet({
        balance: sql<string>`(CAST(account_balances.balance AS NUMERIC) + CAST(${delta} AS NUMERIC))::TEXT`,
      })
    )
    .execute();
}
