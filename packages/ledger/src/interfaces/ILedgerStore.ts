import {
  ConsumerAnalytics,
  MatchResult,
  MatchState,
  ProtocolAnalytics,
  ProviderAnalytics,
  Registry,
  RevenueEntry,
  ScheduledMatch,
  Subscription,
} from "@matchproof/core";

export interface ListOptions {
  limit?: number;
  offset?: number;
}

/**
 * View of the ledger inside one transaction. Reads return detached copies;
 * nothing written here is visible to other transactions until commit.
 */
export interface LedgerTx {
  getRegistry(): Promise<Registry>;
  saveRegistry(registry: Registry): Promise<void>;
  getProtocolAnalytics(): Promise<ProtocolAnalytics>;
  saveProtocolAnalytics(analytics: ProtocolAnalytics): Promise<void>;

  /** Registry table: matchId → ScheduledMatch id */
  findScheduledMatchId(matchId: string): Promise<string | undefined>;
  getScheduledMatch(id: string): Promise<ScheduledMatch | undefined>;
  /** Inserts or updates, registering the match under its matchId. */
  saveScheduledMatch(match: ScheduledMatch): Promise<void>;
  listScheduledMatches(options?: ListOptions & { state?: MatchState }): Promise<ScheduledMatch[]>;

  /** Registry table: matchId → MatchResult id */
  findMatchResultId(matchId: string): Promise<string | undefined>;
  getMatchResult(id: string): Promise<MatchResult | undefined>;
  saveMatchResult(result: MatchResult): Promise<void>;
  listMatchResults(
    options?: ListOptions & { submitter?: string; verified?: boolean }
  ): Promise<MatchResult[]>;
  /** A submitter's results, highest revenueEarned first, oldest first on ties. */
  listTopEarningResults(submitter: string, limit: number): Promise<MatchResult[]>;

  /** Paid-query revenue log */
  recordRevenue(entry: RevenueEntry): Promise<void>;
  /** Entries at or after `since`, oldest first, optionally for one provider. */
  listRevenue(options: { since: number; provider?: string }): Promise<RevenueEntry[]>;

  getSubscription(id: string): Promise<Subscription | undefined>;
  saveSubscription(subscription: Subscription): Promise<void>;
  listSubscriptions(subscriber: string): Promise<Subscription[]>;

  getProviderAnalytics(provider: string): Promise<ProviderAnalytics | undefined>;
  saveProviderAnalytics(analytics: ProviderAnalytics): Promise<void>;
  listTopProviders(limit: number): Promise<ProviderAnalytics[]>;

  getConsumerAnalytics(consumer: string): Promise<ConsumerAnalytics | undefined>;
  saveConsumerAnalytics(analytics: ConsumerAnalytics): Promise<void>;
  /** Returns true the first time `consumer` queries `resultId`. */
  recordConsumerQuery(consumer: string, resultId: string): Promise<boolean>;

  getBalance(address: string): Promise<bigint>;
  credit(address: string, amount: bigint): Promise<void>;
}

/**
 * Transactional storage for the ledger. `transaction` runs `fn` with
 * exclusive, serializable access and commits its writes only if `fn`
 * resolves. A rejection discards every write made inside it.
 */
export interface LedgerStore {
  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T>;
}
