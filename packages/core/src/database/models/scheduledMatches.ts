import { Kysely } from "kysely";
import { db } from "../database";
import { Database, ScheduledMatchRow } from "../types";
import { MatchState, ScheduledMatch } from "../../types/ledger";

const MATCH_STATES: readonly string[] = Object.values(MatchState);

function isMatchState(value: string): value is MatchState {
  return MATCH_STATES.includes(value);
}

function toScheduledMatch(row: ScheduledMatchRow): ScheduledMatch {
  if (!isMatchState(row.state)) {
    throw new Error(`Unknown match state "${row.state}" for ${row.id}`);
  }
  return {
    id: row.id,
    matchId: row.match_id,
    gameId: row.game_id,
    playerA: row.player_a,
    playerB: row.player_b,
    scheduledTime: row.scheduled_time.getTime(),
    state: row.state,
    locked: row.locked,
    createdAt: row.created_at.getTime(),
  };
}

export async function findScheduledMatchById(
  id: string,
  executor: Kysely<Database> = db
): Promise<ScheduledMatch | undefined> {
  const row = await executor
    .selectFrom("scheduled_matches")
    .where("id", "=", id)
    .selectAll()
    .executeTakeFirst();
  return row ? toScheduledMatch(row) : undefined;
}

export async function findScheduledMatchIdByMatchId(
  matchId: string,
  executor: Kysely<Database> = db
): Promise<string | undefined> {
  const row = await executor
    .selectFrom("scheduled_matches")
    .where("match_id", "=", matchId)
    .select("id")
    .executeTakeFirst();
  return row?.id;
}

export async function saveScheduledMatch(
  match: ScheduledMatch,
  executor: Kysely<Database> = db
): Promise<void> {
  const values = {
    id: match.id,
    match_id: match.matchId,
    game_id: match.gameId,
    player_a: match.playerA,
    player_b: match.playerB,
    scheduled_time: new Date(match.scheduledTime),
    state: match.state,
    locked: match.locked,
    created_at: new Date(match.createdAt),
  };
  await executor
    .insertInto("scheduled_matches")
    .values(values)
    .onConflict((oc) =>
      oc.column("id").doUpdateSet({ state: values.state, locked: values.locked })
    )
    .execute();
}

export async function listScheduledMatches(
  options: { state?: MatchState; limit?: number; offset?: number } = {},
  executor: Kysely<Database> = db
): Promise<ScheduledMatch[]> {
  const { state, limit = 50, offset = 0 } = options;
  let query = executor.selectFrom("scheduled_matches");
  if (state) {
    query = query.where("state", "=", state);
  }
  const rows = await query
    .selectAll()
    .orderBy("scheduled_time", "desc")
    .limit(limit)
    .offset(offset)
    .execute();
  return rows.map(toScheduledMatch);
}
