import { Kysely } from "kysely";
import { db } from "../database";
import { Database, RevenueEntryRow } from "../types";
import { RevenueEntry } from "../../types/ledger";

function toRevenueEntry(row: RevenueEntryRow): RevenueEntry {
  return {
    id: row.id,
    resultId: row.match_result_id,
    matchId: row.match_id,
    provider: row.provider,
    consumer: row.consumer,
    providerShare: BigInt(row.provider_share),
    protocolShare: BigInt(row.protocol_share),
    validatorShare: BigInt(row.validator_share),
    createdAt: row.created_at.getTime(),
  };
}

export async function recordRevenueEntry(
  entry: RevenueEntry,
  executor: Kysely<Database> = db
): Promise<void> {
  await executor
    .insertInto("revenue_entries")
    .values({
      id: entry.id,
      match_result_id: entry.resultId,
      match_id: entry.matchId,
      provider: entry.provider,
      consumer: entry.consumer,
      provider_share: entry.providerShare.toString(),
      protocol_share: entry.protocolShare.toString(),
      validator_share: entry.validatorShare.toString(),
      created_at: new Date(entry.createdAt),
    })
    .execute();
}

/** Entries at or after `since`, oldest first. */
export async function listRevenueEntries(
  options: { since: number; provider?: string },
  executor: Kysely<Database> = db
): Promise<RevenueEntry[]> {
  let query = executor
    .selectFrom("revenue_entries")
    .where("created_at", ">=", new Date(options.since));
  if (options.provider) {
    query = query.where("provider", "=", options.provider);
  }
  const rows = await query.selectAll().orderBy("created_at", "asc").orderBy("id").execute();
  return rows.map(toRevenueEntry);
}
