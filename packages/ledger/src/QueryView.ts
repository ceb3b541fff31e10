import { MatchResult, NO_WINNER, PlayerStats, QueryKind } from "@matchproof/core";

export interface OutcomeView {
  kind: "outcome";
  matchId: string;
  winner: string | null;
  draw: boolean;
  verified: boolean;
}

export interface StatsView extends Omit<OutcomeView, "kind"> {
  kind: "stats";
  statsA: PlayerStats;
  statsB: PlayerStats;
}

export interface FullView extends Omit<StatsView, "kind"> {
  kind: "full";
  resultId: string;
  submitter: string;
  contentBlobId: string;
  proofHash: string;
  verifier: string | null;
  submittedAt: number;
  verifiedAt: number | null;
}

export type QueryView = OutcomeView | StatsView | FullView;

/**
 * Project a result into what a consumer receives for `kind`.
 */
export function buildQueryView(result: MatchResult, kind: QueryKind): QueryView {
  const draw = result.winner === NO_WINNER;
  const outcome = {
    matchId: result.matchId,
    winner: draw ? null : result.winner,
    draw,
    verified: result.verified,
  };

  switch (kind) {
    case "outcome":
      return { kind, ...outcome };
    case "stats":
      return { kind, ...outcome, statsA: { ...result.statsA }, statsB: { ...result.statsB } };
    case "full":
      return {
        kind,
        ...outcome,
        statsA: { ...result.statsA },
        statsB: { ...result.statsB },
        resultId: result.id,
        submitter: result.submitter,
        contentBlobId: result.contentBlobId,
        proofHash: result.proofHash,
        verifier: result.verifier,
        submittedAt: result.submittedAt,
        verifiedAt: result.verifiedAt,
      };
  }
}
