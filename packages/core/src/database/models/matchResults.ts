import { Kysely, sql } from "kysely";
import { db } from "../database";
import { Database, MatchResultRow } from "../types";
import { MatchResult, PlayerStats } from "../../types/ledger";

function parseStats(raw: string): PlayerStats {
  const parsed: unknown = JSON.parse(raw);
  if (
    parsed &&
    typeof parsed === "object" &&
    "kills" in parsed &&
    "deaths" in parsed &&
    "score" in parsed
  ) {
    return {
      kills: Number(parsed.kills),
      deaths: Number(parsed.deaths),
      score: Number(parsed.score),
    };
  }
  throw new Error(`Malformed player stats: ${raw}`);
}

function toMatchResult(row: MatchResultRow): MatchResult {
  return {
    id: row.id,
    matchId: row.match_id,
    scheduledMatchId: row.scheduled_match_id,
    submitter: row.submitter,
    winner: row.winner,
    statsA: parseStats(row.stats_a),
    statsB: parseStats(row.stats_b),
    contentBlobId: row.content_blob_id,
    proofHash: row.proof_hash,
    verified: row.verified,
    verifier: row.verifier,
    queryCount: row.query_count,
    revenueEarned: BigInt(row.revenue_earned),
    submittedAt: row.submitted_at.getTime(),
    verifiedAt: row.verified_at?.getTime() ?? null,
  };
}

export async function findMatchResultById(
  id: string,
  executor: Kysely<Database> = db
): Promise<MatchResult | undefined> {
  const row = await executor
    .selectFrom("match_results")
    .where("id", "=", id)
    .selectAll()
    .executeTakeFirst();
  return row ? toMatchResult(row) : undefined;
}

export async function findMatchResultIdByMatchId(
  matchId: string,
  executor: Kysely<Database> = db
): Promise<string | undefined> {
  const row = await executor
    .selectFrom("match_results")
    .where("match_id", "=", matchId)
    .select("id")
    .executeTakeFirst();
  return row?.id;
}

export async function saveMatchResult(
  result: MatchResult,
  executor: Kysely<Database> = db
): Promise<void> {
  const values = {
    id: result.id,
    match_id: result.matchId,
    scheduled_match_id: result.scheduledMatchId,
    submitter: result.submitter,
    winner: result.winner,
    stats_a: JSON.stringify(result.statsA),
    stats_b: JSON.stringify(result.statsB),
    content_blob_id: result.contentBlobId,
    proof_hash: result.proofHash,
    verified: result.verified,
    verifier: result.verifier,
    query_count: result.queryCount,
    revenue_earned: result.revenueEarned.toString(),
    submitted_at: new Date(result.submittedAt),
    verified_at: result.verifiedAt === null ? null : new Date(result.verifiedAt),
  };
  await executor
    .insertInto("match_results")
    .values(values)
    .onConflict((oc) =>
      oc.column("id").doUpdateSet({
        verified: values.verified,
        verifier: values.verifier,
        verified_at: values.verified_at,
        query_count: values.query_count,
        revenue_earned: values.revenue_earned,
      })
    )
    .execute();
}

export async function listMatchResults(
  options: { submitter?: string; verified?: boolean; limit?: number; offset?: number } = {},
  executor: Kysely<Database> = db
): Promise<MatchResult[]> {
  const { submitter, verified, limit = 50, offset = 0 } = options;
  let query = executor.selectFrom("match_results");
  if (submitter) {
    query = query.where("submitter", "=", submitter);
  }
  if (verified !== undefined) {
    query = query.where("verified", "=", verified);
  }
  const rows = await query
    .selectAll()
    .orderBy("submitted_at", "desc")
    .limit(limit)
    .offset(offset)
    .execute();
  return rows.map(toMatchResult);
}

/** A submitter's results by revenue earned, oldest first on ties. */
export async function listTopEarningResults(
  submitter: string,
  limit: number,
  executor: Kysely<Database> = db
): Promise<MatchResult[]> {
  const rows = await executor
    .selectFrom("match_results")
    .selectAll()
    .where("submitter", "=", submitter)
    .orderBy(sql`CAST(revenue_earned AS NUMERIC)`, "desc")
    .orderBy("submitted_at", "asc")
    .limit(limit)
    .execute();
  return rows.map(toMatchResult);
}
