import { Kysely } from "kysely";
import {
  ConsumerAnalytics,
  Database,
  MatchResult,
  MatchState,
  ProtocolAnalytics,
  ProviderAnalytics,
  Registry,
  RevenueEntry,
  ScheduledMatch,
  Subscription,
  creditAccount,
  db,
  findConsumerAnalytics,
  findMatchResultById,
  findMatchResultIdByMatchId,
  findProviderAnalytics,
  findScheduledMatchById,
  findScheduledMatchIdByMatchId,
  findSubscriptionById,
  getAccountBalance,
  getProtocolAnalytics,
  getRegistry,
  listMatchResults,
  listRevenueEntries,
  listScheduledMatches,
  listSubscriptionsBySubscriber,
  listTopEarningResults,
  listTopProviders,
  recordConsumerQuery,
  recordRevenueEntry,
  saveConsumerAnalytics,
  saveMatchResult,
  saveProtocolAnalytics,
  saveProviderAnalytics,
  saveRegistry,
  saveScheduledMatch,
  saveSubscription,
} from "@matchproof/core";
import { LedgerStore, LedgerTx, ListOptions } from "@matchproof/ledger";

/**
 * LedgerTx bound to one open kysely transaction.
 */
class PostgresLedgerTx implements LedgerTx {
  constructor(private readonly trx: Kysely<Database>) {}

  getRegistry(): Promise<Registry> {
    return getRegistry(this.trx);
  }

  saveRegistry(registry: Registry): Promise<void> {
    return saveRegistry(registry, this.trx);
  }

  getProtocolAnalytics(): Promise<ProtocolAnalytics> {
    return getProtocolAnalytics(this.trx);
  }

  saveProtocolAnalytics(analytics: ProtocolAnalytics): Promise<void> {
    return saveProtocolAnalytics(analytics, this.trx);
  }

  findScheduledMatchId(matchId: string): Promise<string | undefined> {
    return findScheduledMatchIdByMatchId(matchId, this.trx);
  }

  getScheduledMatch(id: string): Promise<ScheduledMatch | undefined> {
    return findScheduledMatchById(id, this.trx);
  }

  saveScheduledMatch(match: ScheduledMatch): Promise<void> {
    return saveScheduledMatch(match, this.trx);
  }

  listScheduledMatches(options: ListOptions & { state?: MatchState } = {}): Promise<ScheduledMatch[]> {
    return listScheduledMatches(options, this.trx);
  }

  findMatchResultId(matchId: string): Promise<string | undefined> {
    return findMatchResultIdByMatchId(matchId, this.trx);
  }

  getMatchResult(id: string): Promise<MatchResult | undefined> {
    return findMatchResultById(id, this.trx);
  }

  saveMatchResult(result: MatchResult): Promise<void> {
    return saveMatchResult(result, this.trx);
  }

  listMatchResults(
    options: ListOptions & { submitter?: string; verified?: boolean } = {}
  ): Promise<MatchResult[]> {
    return listMatchResults(options, this.trx);
  }

  listTopEarningResults(submitter: string, limit: number): Promise<MatchResult[]> {
    return listTopEarningResults(submitter, limit, this.trx);
  }

  recordRevenue(entry: RevenueEntry): Promise<void> {
    return recordRevenueEntry(entry, this.trx);
  }

  listRevenue(options: { since: number; provider?: string }): Promise<RevenueEntry[]> {
    return listRevenueEntries(options, this.trx);
  }

  getSubscription(id: string): Promise<Subscription | undefined> {
    return findSubscriptionById(id, this.trx);
  }

  saveSubscription(subscription: Subscription): Promise<void> {
    return saveSubscription(subscription, this.trx);
  }

  listSubscriptions(subscriber: string): Promise<Subscription[]> {
    return listSubscriptionsBySubscriber(subscriber, this.trx);
  }

  getProviderAnalytics(provider: string): Promise<ProviderAnalytics | undefined> {
    return findProviderAnalytics(provider, this.trx);
  }

  saveProviderAnalytics(analytics: ProviderAnalytics): Promise<void> {
    return saveProviderAnalytics(analytics, this.trx);
  }

  listTopProviders(limit: number): Promise<ProviderAnalytics[]> {
    return listTopProviders(limit, this.trx);
  }

  getConsumerAnalytics(consumer: string): Promise<ConsumerAnalytics | undefined> {
    return findConsumerAnalytics(consumer, this.trx);
  }

  saveConsumerAnalytics(analytics: ConsumerAnalytics): Promise<void> {
    return saveConsumerAnalytics(analytics, this.trx);
  }

  recordConsumerQuery(consumer: string, resultId: string): Promise<boolean> {
    return recordConsumerQuery(consumer, resultId, this.trx);
  }

  getBalance(address: string): Promise<bigint> {
    return getAccountBalance(address, this.trx);
  }

  credit(address: string, amount: bigint): Promise<void> {
    return creditAccount(address, amount, this.trx);
  }
}

/**
 * Ledger storage on Postgres. Every operation runs in a SERIALIZABLE
 * transaction, so concurrent writers either see each other's commits or
 * one of them fails with a serialization error and rolls back.
 */
export class PostgresLedgerStore implements LedgerStore {
  constructor(private readonly database: Kysely<Database> = db) {}

  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    return this.database
      .transaction()
      .setIsolationLevel("serializable")
      .execute((trx) => fn(new PostgresLedgerTx(trx)));
  }
}
