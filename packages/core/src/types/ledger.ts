export enum MatchState {
  SCHEDULED = "scheduled",
  COMPLETED = "completed",
  VERIFIED = "verified",
  /** Reserved. No operation transitions into or out of it. */
  DISPUTED = "disputed",
}

export enum SubscriptionTier {
  BASIC = "basic",
  PRO = "pro",
  ENTERPRISE = "enterprise",
}

export type QueryKind = "outcome" | "stats" | "full";

export interface PlayerStats {
  kills: number;
  deaths: number;
  score: number;
}

export interface ScheduledMatch {
  id: string;
  matchId: string;
  gameId: string;
  playerA: string;
  playerB: string;
  /** Epoch ms at which the match may be locked */
  scheduledTime: number;
  state: MatchState;
  locked: boolean;
  createdAt: number;
}

export interface MatchResult {
  id: string;
  matchId: string;
  /** Id of the ScheduledMatch this result completes */
  scheduledMatchId: string;
  submitter: string;
  /** A participant address, or NO_WINNER for a draw */
  winner: string;
  statsA: PlayerStats;
  statsB: PlayerStats;
  contentBlobId: string;
  proofHash: string;
  verified: boolean;
  verifier: string | null;
  queryCount: number;
  revenueEarned: bigint;
  submittedAt: number;
  verifiedAt: number | null;
}

/** One paid query's split, kept for time-bucketed earnings. */
export interface RevenueEntry {
  id: string;
  resultId: string;
  matchId: string;
  provider: string;
  consumer: string;
  providerShare: bigint;
  protocolShare: bigint;
  validatorShare: bigint;
  createdAt: number;
}

export interface Subscription {
  id: string;
  subscriber: string;
  tier: SubscriptionTier;
  queriesRemaining: number;
  validUntil: number;
  totalQueriesUsed: number;
  pricePaid: bigint;
  createdAt: number;
}

export interface Registry {
  totalMatchesScheduled: number;
  totalMatchesCompleted: number;
  totalQueries: number;
  protocolBalance: bigint;
  validatorPool: bigint;
}

export interface ProviderAnalytics {
  provider: string;
  totalMatchesSubmitted: number;
  totalMatchesVerified: number;
  matchesScheduled: number;
  matchesCompleted: number;
  totalRevenueEarned: bigint;
  totalQueriesServed: number;
  averageRevenuePerMatch: bigint;
  highestEarningMatchRevenue: bigint;
  winCount: number;
  lossCount: number;
  drawCount: number;
  /** Whole percent, truncated */
  winRate: number;
  firstMatchAt: number | null;
  lastMatchAt: number | null;
}

export interface ConsumerAnalytics {
  consumer: string;
  totalQueriesMade: number;
  paidQueries: number;
  subscribedQueries: number;
  uniqueMatchesQueried: number;
  totalSpent: bigint;
  averageCostPerQuery: bigint;
  activeSubscriptionId: string | null;
  subscriptionTier: SubscriptionTier | null;
  firstQueryAt: number | null;
  lastQueryAt: number | null;
  memberSince: number | null;
}

export interface ProtocolAnalytics {
  totalMatchesScheduled: number;
  totalMatchesCompleted: number;
  totalMatchesVerified: number;
  totalQueriesProcessed: number;
  paidQueries: number;
  subscribedQueries: number;
  totalProtocolRevenue: bigint;
  totalProviderPayouts: bigint;
  totalValidatorRewards: bigint;
  totalProviders: number;
  totalConsumers: number;
  basicSubscribers: number;
  proSubscribers: number;
  enterpriseSubscribers: number;
  subscriptionRevenue: bigint;
}

export interface AccountBalance {
  address: string;
  balance: bigint;
}
