import {
  ConsumerAnalytics,
  MatchResult,
  ProtocolAnalytics,
  ProviderAnalytics,
  Registry,
  RevenueEntry,
  ScheduledMatch,
  Subscription,
} from "@matchproof/core";
import { LedgerStore, LedgerTx, ListOptions } from "./interfaces/ILedgerStore";
import { emptyProtocolAnalytics, emptyRegistry } from "./Analytics";

interface MemoryState {
  registry: Registry;
  protocol: ProtocolAnalytics;
  scheduledMatches: Map<string, ScheduledMatch>;
  scheduledByMatchId: Map<string, string>;
  matchResults: Map<string, MatchResult>;
  resultsByMatchId: Map<string, string>;
  revenue: Map<string, RevenueEntry>;
  subscriptions: Map<string, Subscription>;
  providers: Map<string, ProviderAnalytics>;
  consumers: Map<string, ConsumerAnalytics>;
  consumerQueries: Map<string, true>;
  balances: Map<string, bigint>;
}

/**
 * Writes made during a transaction, layered over the committed map.
 */
class StagedMap<V> {
  private writes = new Map<string, V>();

  constructor(private readonly base: Map<string, V>) {}

  get(key: string): V | undefined {
    return this.writes.has(key) ? this.writes.get(key) : this.base.get(key);
  }

  set(key: string, value: V): void {
    this.writes.set(key, value);
  }

  values(): V[] {
    const merged = new Map(this.base);
    for (const [key, value] of this.writes) {
      merged.set(key, value);
    }
    return Array.from(merged.values());
  }

  commit(): void {
    for (const [key, value] of this.writes) {
      this.base.set(key, value);
    }
  }
}

function page<T>(items: T[], options: ListOptions): T[] {
  const { limit = 50, offset = 0 } = options;
  return items.slice(offset, offset + limit);
}

class MemoryLedgerTx implements LedgerTx {
  private registry: Registry | null = null;
  private protocol: ProtocolAnalytics | null = null;
  private scheduledMatches: StagedMap<ScheduledMatch>;
  private scheduledByMatchId: StagedMap<string>;
  private matchResults: StagedMap<MatchResult>;
  private resultsByMatchId: StagedMap<string>;
  private revenue: StagedMap<RevenueEntry>;
  private subscriptions: StagedMap<Subscription>;
  private providers: StagedMap<ProviderAnalytics>;
  private consumers: StagedMap<ConsumerAnalytics>;
  private consumerQueries: StagedMap<true>;
  private balances: StagedMap<bigint>;

  constructor(private readonly state: MemoryState) {
    this.scheduledMatches = new StagedMap(state.scheduledMatches);
    this.scheduledByMatchId = new StagedMap(state.scheduledByMatchId);
    this.matchResults = new StagedMap(state.matchResults);
    this.resultsByMatchId = new StagedMap(state.resultsByMatchId);
    this.revenue = new StagedMap(state.revenue);
    this.subscriptions = new StagedMap(state.subscriptions);
    this.providers = new StagedMap(state.providers);
    this.consumers = new StagedMap(state.consumers);
    this.consumerQueries = new StagedMap(state.consumerQueries);
    this.balances = new StagedMap(state.balances);
  }

  async getRegistry(): Promise<Registry> {
    return structuredClone(this.registry ?? this.state.registry);
  }

  async saveRegistry(registry: Registry): Promise<void> {
    this.registry = structuredClone(registry);
  }

  async getProtocolAnalytics(): Promise<ProtocolAnalytics> {
    return structuredClone(this.protocol ?? this.state.protocol);
  }

  async saveProtocolAnalytics(analytics: ProtocolAnalytics): Promise<void> {
    this.protocol = structuredClone(analytics);
  }

  async findScheduledMatchId(matchId: string): Promise<string | undefined> {
    return this.scheduledByMatchId.get(matchId);
  }

  async getScheduledMatch(id: string): Promise<ScheduledMatch | undefined> {
    return detach(this.scheduledMatches.get(id));
  }

  async saveScheduledMatch(match: ScheduledMatch): Promise<void> {
    this.scheduledMatches.set(match.id, structuredClone(match));
    this.scheduledByMatchId.set(match.matchId, match.id);
  }

  async listScheduledMatches(
    options: ListOptions & { state?: ScheduledMatch["state"] } = {}
  ): Promise<ScheduledMatch[]> {
    const matches = this.scheduledMatches
      .values()
      .filter((m) => !options.state || m.state === options.state)
      .sort((a, b) => b.scheduledTime - a.scheduledTime);
    return page(matches, options).map((m) => structuredClone(m));
  }

  async findMatchResultId(matchId: string): Promise<string | undefined> {
    return this.resultsByMatchId.get(matchId);
  }

  async getMatchResult(id: string): Promise<MatchResult | undefined> {
    return detach(this.matchResults.get(id));
  }

  async saveMatchResult(result: MatchResult): Promise<void> {
    this.matchResults.set(result.id, structuredClone(result));
    this.resultsByMatchId.set(result.matchId, result.id);
  }

  async listMatchResults(
    options: ListOptions & { submitter?: string; verified?: boolean } = {}
  ): Promise<MatchResult[]> {
    const results = this.matchResults
      .values()
      .filter((r) => !options.submitter || r.submitter === options.submitter)
      .filter((r) => options.verified === undefined || r.verified === options.verified)
      .sort((a, b) => b.submittedAt - a.submittedAt);
    return page(results, options).map((r) => structuredClone(r));
  }

  async listTopEarningResults(submitter: string, limit: number): Promise<MatchResult[]> {
    return this.matchResults
      .values()
      .filter((r) => r.submitter === submitter)
      .sort((a, b) => {
        if (a.revenueEarned !== b.revenueEarned) {
          return a.revenueEarned > b.revenueEarned ? -1 : 1;
        }
        return a.submittedAt - b.submittedAt;
      })
      .slice(0, limit)
      .map((r) => structuredClone(r));
  }

  async recordRevenue(entry: RevenueEntry): Promise<void> {
    this.revenue.set(entry.id, structuredClone(entry));
  }

  async listRevenue(options: { since: number; provider?: string }): Promise<RevenueEntry[]> {
    return this.revenue
      .values()
      .filter((e) => e.createdAt >= options.since)
      .filter((e) => !options.provider || e.provider === options.provider)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((e) => structuredClone(e));
  }

  async getSubscription(id: string): Promise<Subscription | undefined> {
    return detach(this.subscriptions.get(id));
  }

  async saveSubscription(subscription: Subscription): Promise<void> {
    this.subscriptions.set(subscription.id, structuredClone(subscription));
  }

  async listSubscriptions(subscriber: string): Promise<Subscription[]> {
    return this.subscriptions
      .values()
      .filter((s) => s.subscriber === subscriber)
      .sort((a, b) => b.createdAt - a.createdAt)
      .map((s) => structuredClone(s));
  }

  async getProviderAnalytics(provider: string): Promise<ProviderAnalytics | undefined> {
    return detach(this.providers.get(provider));
  }

  async saveProviderAnalytics(analytics: ProviderAnalytics): Promise<void> {
    this.providers.set(analytics.provider, structuredClone(analytics));
  }

  async listTopProviders(limit: number): Promise<ProviderAnalytics[]> {
    return this.providers
      .values()
      .filter((p) => p.totalMatchesSubmitted > 0)
      .sort((a, b) => {
        if (a.totalRevenueEarned !== b.totalRevenueEarned) {
          return a.totalRevenueEarned > b.totalRevenueEarned ? -1 : 1;
        }
        return b.winRate - a.winRate;
      })
      .slice(0, limit)
      .map((p) => structuredClone(p));
  }

  async getConsumerAnalytics(consumer: string): Promise<ConsumerAnalytics | undefined> {
    return detach(this.consumers.get(consumer));
  }

  async saveConsumerAnalytics(analytics: ConsumerAnalytics): Promise<void> {
    this.consumers.set(analytics.consumer, structuredClone(analytics));
  }

  async recordConsumerQuery(consumer: string, resultId: string): Promise<boolean> {
    const key = `${consumer}:${resultId}`;
    if (this.consumerQueries.get(key)) {
      return false;
    }
    this.consumerQueries.set(key, true);
    return true;
  }

  async getBalance(address: string): Promise<bigint> {
    return this.balances.get(address) ?? 0n;
  }

  async credit(address: string, amount: bigint): Promise<void> {
    this.balances.set(address, (this.balances.get(address) ?? 0n) + amount);
  }

  commit(): void {
    if (this.registry) this.state.registry = this.registry;
    if (this.protocol) this.state.protocol = this.protocol;
    this.scheduledMatches.commit();
    this.scheduledByMatchId.commit();
    this.matchResults.commit();
    this.resultsByMatchId.commit();
    this.revenue.commit();
    this.subscriptions.commit();
    this.providers.commit();
    this.consumers.commit();
    this.consumerQueries.commit();
    this.balances.commit();
  }
}

function detach<T>(value: T | undefined): T | undefined {
  return value === undefined ? undefined : structuredClone(value);
}

/**
 * In-process LedgerStore. Transactions run one at a time in arrival order;
 * writes are staged and applied together when the transaction resolves.
 */
export class MemoryLedgerStore implements LedgerStore {
  private state: MemoryState = {
    registry: emptyRegistry(),
    protocol: emptyProtocolAnalytics(),
    scheduledMatches: new Map(),
    scheduledByMatchId: new Map(),
    matchResults: new Map(),
    resultsByMatchId: new Map(),
    revenue: new Map(),
    subscriptions: new Map(),
    providers: new Map(),
    consumers: new Map(),
    consumerQueries: new Map(),
    balances: new Map(),
  };
  private tail: Promise<void> = Promise.resolve();

  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const tx = new MemoryLedgerTx(this.state);
      const value = await fn(tx);
      tx.commit();
      return value;
    });
    // The caller sees the outcome through `run`; the queue only needs to
    // know that it settled.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
