import {
  ConsumerAnalytics,
  MatchData,
  MatchResult,
  PlayerStats,
  ProtocolAnalytics,
  ProviderAnalytics,
  QueryKind,
  Registry,
  ScheduledMatch,
  Serialized,
  Subscription,
  SubscriptionTier,
} from "@matchproof/core";

export interface ClientConfig {
  /** HTTP base URL, e.g. "http://localhost:8080" */
  serverUrl: string;
  /** The caller's EVM address. */
  address: string;
  /**
   * Signs a message with the caller's private key (EIP-191 personal_sign).
   * Example with ethers.js: `signMessage: (msg) => wallet.signMessage(msg)`
   */
  signMessage: (message: string) => Promise<string>;
  /** Injected for tests. Defaults to the global fetch. */
  fetch?: typeof fetch;
}

// Amounts travel as decimal strings of base units.
export type ApiScheduledMatch = Serialized<ScheduledMatch>;
export type ApiMatchResult = Serialized<MatchResult>;
export type ApiSubscription = Serialized<Subscription>;
export type ApiRegistry = Serialized<Registry>;
export type ApiProviderAnalytics = Serialized<ProviderAnalytics>;
export type ApiConsumerAnalytics = Serialized<ConsumerAnalytics>;
export type ApiProtocolAnalytics = Serialized<ProtocolAnalytics>;

export interface ApiTopEarningMatch {
  resultId: string;
  matchId: string;
  gameId: string | null;
  revenue: string;
  queries: number;
}

export interface ApiRevenuePoint {
  /** Start of the UTC day, epoch ms */
  timestamp: number;
  value: string;
}

export interface ApiProviderEarnings {
  provider: string;
  totalEarned: string;
  queriesServed: number;
  averagePerQuery: string;
  highestMatchRevenue: string;
  today: string;
  thisWeek: string;
  thisMonth: string;
  topMatches: ApiTopEarningMatch[];
  revenueOverTime: ApiRevenuePoint[];
}

export interface ApiProviderPerformance {
  provider: string;
  wins: number;
  losses: number;
  draws: number;
  winRate: number;
  totalMatches: number;
  recentForm: ("W" | "L" | "D")[];
  byGame: { gameId: string; matches: number; winRate: number }[];
}

export interface HealthResponse {
  status: "ok";
  store: string;
  registry: ApiRegistry;
}

export interface PaidQueryResponse {
  resultId: string;
  matchId: string;
  queryKind: QueryKind;
  payment: string;
  providerShare: string;
  protocolShare: string;
  validatorShare: string;
  burned: string;
  data: Record<string, unknown>;
}

export interface SubscribedQueryResponse {
  resultId: string;
  matchId: string;
  queryKind: QueryKind;
  subscriptionId: string;
  queriesRemaining: number;
  data: Record<string, unknown>;
}

export interface SubmitResultResponse {
  result: ApiMatchResult;
  blobId: string;
}

export interface ScheduleRequest {
  matchId: string;
  gameId: string;
  opponent: string;
  scheduledTime: number;
}

/** What a game reports when a match ends. */
export interface MatchOutcome {
  winner: string;
  statsA: PlayerStats;
  statsB: PlayerStats;
  details?: Record<string, unknown>;
}

export interface MatchRunner {
  /** Play the match once it has been locked and report how it ended. */
  play(match: ApiScheduledMatch): MatchOutcome | Promise<MatchOutcome>;
}

export interface PlayOptions {
  gameId: string;
  opponent: string;
  /** Defaults to a random id. */
  matchId?: string;
  /** Delay between scheduling and the start time. Defaults to 1000 ms. */
  startsInMs?: number;
  onLog?: (tag: string, message: string) => void;
}

export interface PlayedMatch {
  match: ApiScheduledMatch;
  result: ApiMatchResult;
  matchData: MatchData;
  blobId: string;
}

export type { QueryKind, SubscriptionTier };
