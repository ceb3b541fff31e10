import { MatchResult, NO_WINNER, ProviderAnalytics, RevenueEntry } from "@matchproof/core";
import { LedgerTx } from "./interfaces/ILedgerStore";
import { averageOf, computeWinRate } from "./Analytics";

// Provider reports read history (the revenue log and the result list) on top
// of the incremental aggregates. They are computed on demand and never stored.

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Days of history in an earnings report */
export const EARNINGS_WINDOW_DAYS = 30;
export const EARNINGS_TOP_MATCHES = 5;
/** Results considered by a performance report, newest first */
export const PERFORMANCE_HISTORY = 50;
export const RECENT_FORM_LENGTH = 10;

export interface TopEarningMatch {
  resultId: string;
  matchId: string;
  /** null when the scheduled match is missing */
  gameId: string | null;
  revenue: bigint;
  queries: number;
}

export interface RevenuePoint {
  /** Start of the UTC day, epoch ms */
  timestamp: number;
  value: bigint;
}

export interface ProviderEarnings {
  provider: string;
  totalEarned: bigint;
  queriesServed: number;
  averagePerQuery: bigint;
  highestMatchRevenue: bigint;
  /** Provider share over the trailing 24 hours */
  today: bigint;
  thisWeek: bigint;
  thisMonth: bigint;
  topMatches: TopEarningMatch[];
  revenueOverTime: RevenuePoint[];
}

/** Win, loss or draw from the submitter's side */
export type FormMark = "W" | "L" | "D";

export interface GamePerformance {
  gameId: string;
  matches: number;
  winRate: number;
}

export interface ProviderPerformance {
  provider: string;
  wins: number;
  losses: number;
  draws: number;
  winRate: number;
  totalMatches: number;
  recentForm: FormMark[];
  byGame: GamePerformance[];
}

export function startOfUtcDay(timestamp: number): number {
  return Math.floor(timestamp / DAY_MS) * DAY_MS;
}

/**
 * Provider share per UTC day for the `days` days ending with the day of
 * `now`, oldest first. Days without revenue read as 0.
 */
export function bucketRevenueByDay(entries: RevenueEntry[], days: number, now: number): RevenuePoint[] {
  const first = startOfUtcDay(now) - (days - 1) * DAY_MS;
  const points: RevenuePoint[] = [];
  for (let i = 0; i < days; i++) {
    points.push({ timestamp: first + i * DAY_MS, value: 0n });
  }
  for (const entry of entries) {
    const point = points[Math.floor((entry.createdAt - first) / DAY_MS)];
    if (point && entry.createdAt <= now) point.value += entry.providerShare;
  }
  return points;
}

export function sumProviderShareSince(entries: RevenueEntry[], since: number): bigint {
  return entries
    .filter((e) => e.createdAt >= since)
    .reduce((sum, e) => sum + e.providerShare, 0n);
}

export function formMark(result: MatchResult): FormMark {
  if (result.winner === NO_WINNER) return "D";
  return result.winner === result.submitter ? "W" : "L";
}

export async function loadTopEarningMatches(
  tx: LedgerTx,
  provider: string,
  limit: number
): Promise<TopEarningMatch[]> {
  const top: TopEarningMatch[] = [];
  for (const result of await tx.listTopEarningResults(provider, limit)) {
    const match = await tx.getScheduledMatch(result.scheduledMatchId);
    top.push({
      resultId: result.id,
      matchId: result.matchId,
      gameId: match?.gameId ?? null,
      revenue: result.revenueEarned,
      queries: result.queryCount,
    });
  }
  return top;
}

export function buildEarnings(
  analytics: ProviderAnalytics,
  entries: RevenueEntry[],
  topMatches: TopEarningMatch[],
  now: number
): ProviderEarnings {
  return {
    provider: analytics.provider,
    totalEarned: analytics.totalRevenueEarned,
    queriesServed: analytics.totalQueriesServed,
    averagePerQuery: averageOf(analytics.totalRevenueEarned, analytics.totalQueriesServed),
    highestMatchRevenue: analytics.highestEarningMatchRevenue,
    today: sumProviderShareSince(entries, now - DAY_MS),
    thisWeek: sumProviderShareSince(entries, now - 7 * DAY_MS),
    thisMonth: sumProviderShareSince(entries, now - EARNINGS_WINDOW_DAYS * DAY_MS),
    topMatches,
    revenueOverTime: bucketRevenueByDay(entries, EARNINGS_WINDOW_DAYS, now),
  };
}

/**
 * `history` is newest first, each result paired with its game. Games are
 * listed in the order they first appear.
 */
export function buildPerformance(
  analytics: ProviderAnalytics,
  history: { result: MatchResult; gameId: string }[]
): ProviderPerformance {
  const games = new Map<string, { wins: number; matches: number }>();
  for (const { result, gameId } of history) {
    const game = games.get(gameId) ?? { wins: 0, matches: 0 };
    game.matches += 1;
    if (formMark(result) === "W") game.wins += 1;
    games.set(gameId, game);
  }

  return {
    provider: analytics.provider,
    wins: analytics.winCount,
    losses: analytics.lossCount,
    draws: analytics.drawCount,
    winRate: analytics.winRate,
    totalMatches: analytics.totalMatchesSubmitted,
    recentForm: history.slice(0, RECENT_FORM_LENGTH).map(({ result }) => formMark(result)),
    byGame: Array.from(games, ([gameId, game]) => ({
      gameId,
      matches: game.matches,
      winRate: computeWinRate(game.wins, game.matches),
    })),
  };
}
