export { GamePlayer } from "./player";
export { HttpClient, ApiError } from "./http";
export { ProofBuilder } from "./proof";
export type {
  ClientConfig,
  MatchRunner,
  MatchOutcome,
  PlayOptions,
  PlayedMatch,
  HealthResponse,
  PaidQueryResponse,
  SubscribedQueryResponse,
  SubmitResultResponse,
  ScheduleRequest,
  ApiScheduledMatch,
  ApiMatchResult,
  ApiSubscription,
  ApiRegistry,
  ApiProviderAnalytics,
  ApiConsumerAnalytics,
  ApiProtocolAnalytics,
  ApiProviderEarnings,
  ApiProviderPerformance,
  ApiRevenuePoint,
  ApiTopEarningMatch,
} from "./types";

// Re-export commonly needed types from core
export type { MatchData, MatchProof, PlayerStats, QueryKind } from "@matchproof/core";
