import { randomUUID } from "crypto";
import {
  ConsumerAnalytics,
  LedgerEvent,
  MatchResult,
  MatchState,
  ProtocolAnalytics,
  ProviderAnalytics,
  QueryKind,
  LedgerErrorCode,
  Registry,
  ScheduledMatch,
  Subscription,
  normalizeAddress,
} from "@matchproof/core";
import { Coin } from "./Coin";
import { Clock, systemClock } from "./Clock";
import { LedgerStore, LedgerTx, ListOptions } from "./interfaces/ILedgerStore";
import { LedgerEventSink } from "./interfaces/ILedgerEventSink";
import { VerificationPolicy } from "./interfaces/IVerificationPolicy";
import { OperationContext, ensure } from "./OperationContext";
import { nullEventSink } from "./EventSinks";
import { openVerification } from "./VerificationPolicies";
import { ResultParams, ScheduleParams, lockMatch, scheduleMatch, submitResult, verifyResult } from "./MatchLifecycle";
import { chargeQuery, consumeSubscriptionQuery, sellSubscription } from "./RevenueDistributor";
import { QueryView, buildQueryView } from "./QueryView";
import { emptyConsumerAnalytics, emptyProviderAnalytics } from "./Analytics";
import {
  DAY_MS,
  EARNINGS_TOP_MATCHES,
  EARNINGS_WINDOW_DAYS,
  PERFORMANCE_HISTORY,
  ProviderEarnings,
  ProviderPerformance,
  RevenuePoint,
  TopEarningMatch,
  buildEarnings,
  buildPerformance,
  bucketRevenueByDay,
  loadTopEarningMatches,
  startOfUtcDay,
} from "./Reports";
import log from "./logger";

export interface LedgerOptions {
  store: LedgerStore;
  clock?: Clock;
  events?: LedgerEventSink;
  verificationPolicy?: VerificationPolicy;
  generateId?: () => string;
}

export interface PaidQueryReceipt {
  resultId: string;
  matchId: string;
  queryKind: QueryKind;
  payment: bigint;
  providerShare: bigint;
  protocolShare: bigint;
  validatorShare: bigint;
  burned: bigint;
  data: QueryView;
}

export interface SubscribedQueryReceipt {
  resultId: string;
  matchId: string;
  queryKind: QueryKind;
  subscriptionId: string;
  queriesRemaining: number;
  data: QueryView;
}

/**
 * Entry point for every ledger operation. Each call runs in one store
 * transaction; events are published after it commits. A failed call throws
 * a LedgerError and changes nothing.
 */
export class Ledger {
  private store: LedgerStore;
  private clock: Clock;
  private events: LedgerEventSink;
  private policy: VerificationPolicy;
  private generateId: () => string;

  constructor(opts: LedgerOptions) {
    this.store = opts.store;
    this.clock = opts.clock ?? systemClock;
    this.events = opts.events ?? nullEventSink;
    this.policy = opts.verificationPolicy ?? openVerification;
    this.generateId = opts.generateId ?? randomUUID;
  }

  // ---- match lifecycle ----

  async schedule(caller: string, params: ScheduleParams): Promise<ScheduledMatch> {
    const ctx = this.context(caller);
    const match = await this.store.transaction((tx) =>
      scheduleMatch(tx, ctx, { ...params, opponent: normalizeAddress(params.opponent) })
    );
    await this.emit({ type: "match.scheduled", timestamp: ctx.now, payload: { match } });
    return match;
  }

  async lock(caller: string, scheduledMatchId: string): Promise<ScheduledMatch> {
    const ctx = this.context(caller);
    const match = await this.store.transaction((tx) => lockMatch(tx, ctx, scheduledMatchId));
    await this.emit({ type: "match.locked", timestamp: ctx.now, payload: { match } });
    return match;
  }

  async submitResult(
    caller: string,
    scheduledMatchId: string,
    params: ResultParams
  ): Promise<MatchResult> {
    const ctx = this.context(caller);
    const { result } = await this.store.transaction((tx) =>
      submitResult(tx, ctx, scheduledMatchId, { ...params, winner: normalizeAddress(params.winner) })
    );
    await this.emit({ type: "result.submitted", timestamp: ctx.now, payload: { result } });
    return result;
  }

  async verify(caller: string, scheduledMatchId: string, resultId: string): Promise<MatchResult> {
    const ctx = this.context(caller);
    const { result } = await this.store.transaction((tx) =>
      verifyResult(tx, ctx, this.policy, scheduledMatchId, resultId)
    );
    await this.emit({ type: "result.verified", timestamp: ctx.now, payload: { result } });
    return result;
  }

  // ---- revenue ----

  /**
   * Pay for one query with `payment`. The coin's whole value is taken up
   * front; if the call throws, it is handed back.
   */
  async queryPaid(
    caller: string,
    resultId: string,
    payment: Coin,
    queryKind: QueryKind
  ): Promise<PaidQueryReceipt> {
    const ctx = this.context(caller);
    const held = payment.split(payment.value());
    const amount = held.value();
    const { result, split } = await this.settle(payment, held, (tx) =>
      chargeQuery(tx, ctx, resultId, amount)
    );

    await this.emit({
      type: "query.paid",
      timestamp: ctx.now,
      payload: {
        resultId: result.id,
        matchId: result.matchId,
        consumer: ctx.caller,
        provider: result.submitter,
        queryKind,
        payment: amount,
        providerShare: split.provider,
        protocolShare: split.protocol,
        validatorShare: split.validator,
      },
    });

    return {
      resultId: result.id,
      matchId: result.matchId,
      queryKind,
      payment: amount,
      providerShare: split.provider,
      protocolShare: split.protocol,
      validatorShare: split.validator,
      burned: split.burned,
      data: buildQueryView(result, queryKind),
    };
  }

  async querySubscribed(
    caller: string,
    resultId: string,
    subscriptionId: string,
    queryKind: QueryKind
  ): Promise<SubscribedQueryReceipt> {
    const ctx = this.context(caller);
    const { result, subscription } = await this.store.transaction((tx) =>
      consumeSubscriptionQuery(tx, ctx, resultId, subscriptionId)
    );

    await this.emit({
      type: "query.subscribed",
      timestamp: ctx.now,
      payload: {
        resultId: result.id,
        matchId: result.matchId,
        consumer: ctx.caller,
        subscriptionId: subscription.id,
        queryKind,
        queriesRemaining: subscription.queriesRemaining,
      },
    });

    return {
      resultId: result.id,
      matchId: result.matchId,
      queryKind,
      subscriptionId: subscription.id,
      queriesRemaining: subscription.queriesRemaining,
      data: buildQueryView(result, queryKind),
    };
  }

  /** Buy a subscription. Takes the value of `payment`, handing it back if the call throws. */
  async createSubscription(caller: string, tier: string, payment: Coin): Promise<Subscription> {
    const ctx = this.context(caller);
    const held = payment.split(payment.value());
    const amount = held.value();
    const subscription = await this.settle(payment, held, (tx) =>
      sellSubscription(tx, ctx, tier, amount)
    );

    await this.emit({
      type: "subscription.created",
      timestamp: ctx.now,
      payload: { subscription, tier: subscription.tier },
    });
    return subscription;
  }

  // ---- reads ----

  getRegistry(): Promise<Registry> {
    return this.read((tx) => tx.getRegistry());
  }

  async getScheduledMatch(id: string): Promise<ScheduledMatch | undefined> {
    return this.read((tx) => tx.getScheduledMatch(id));
  }

  /** Look up a scheduled match by its external matchId. */
  async findScheduledMatch(matchId: string): Promise<ScheduledMatch | undefined> {
    return this.read(async (tx) => {
      const id = await tx.findScheduledMatchId(matchId);
      return id === undefined ? undefined : tx.getScheduledMatch(id);
    });
  }

  listScheduledMatches(options?: ListOptions & { state?: MatchState }): Promise<ScheduledMatch[]> {
    return this.read((tx) => tx.listScheduledMatches(options));
  }

  getMatchResult(id: string): Promise<MatchResult | undefined> {
    return this.read((tx) => tx.getMatchResult(id));
  }

  async findMatchResult(matchId: string): Promise<MatchResult | undefined> {
    return this.read(async (tx) => {
      const id = await tx.findMatchResultId(matchId);
      return id === undefined ? undefined : tx.getMatchResult(id);
    });
  }

  listMatchResults(
    options?: ListOptions & { submitter?: string; verified?: boolean }
  ): Promise<MatchResult[]> {
    const submitter = options?.submitter && normalizeAddress(options.submitter);
    return this.read((tx) => tx.listMatchResults({ ...options, submitter }));
  }

  getSubscription(id: string): Promise<Subscription | undefined> {
    return this.read((tx) => tx.getSubscription(id));
  }

  listSubscriptions(subscriber: string): Promise<Subscription[]> {
    return this.read((tx) => tx.listSubscriptions(normalizeAddress(subscriber)));
  }

  getBalance(address: string): Promise<bigint> {
    return this.read((tx) => tx.getBalance(normalizeAddress(address)));
  }

  /** An address with no activity reads as an all-zero aggregate. */
  async getProviderAnalytics(provider: string): Promise<ProviderAnalytics> {
    const address = normalizeAddress(provider);
    const found = await this.read((tx) => tx.getProviderAnalytics(address));
    return found ?? emptyProviderAnalytics(address);
  }

  async getConsumerAnalytics(consumer: string): Promise<ConsumerAnalytics> {
    const address = normalizeAddress(consumer);
    const found = await this.read((tx) => tx.getConsumerAnalytics(address));
    return found ?? emptyConsumerAnalytics(address);
  }

  getProtocolAnalytics(): Promise<ProtocolAnalytics> {
    return this.read((tx) => tx.getProtocolAnalytics());
  }

  listTopProviders(limit = 10): Promise<ProviderAnalytics[]> {
    return this.read((tx) => tx.listTopProviders(limit));
  }

  // ---- provider reports ----

  /** A provider's results ranked by the revenue they earned. */
  getTopEarningMatches(provider: string, limit = 3): Promise<TopEarningMatch[]> {
    const address = normalizeAddress(provider);
    return this.read((tx) => loadTopEarningMatches(tx, address, limit));
  }

  /**
   * Provider share of paid queries per UTC day, for the `days` days ending
   * today. Covers every provider unless one is named.
   */
  async getRevenueOverTime(days = EARNINGS_WINDOW_DAYS, provider?: string): Promise<RevenuePoint[]> {
    ensure(
      Number.isInteger(days) && days > 0,
      LedgerErrorCode.INVALID_INPUT,
      `days must be a positive integer, got ${days}`
    );
    const now = this.clock();
    const since = startOfUtcDay(now) - (days - 1) * DAY_MS;
    const entries = await this.read((tx) =>
      tx.listRevenue({ since, provider: provider && normalizeAddress(provider) })
    );
    return bucketRevenueByDay(entries, days, now);
  }

  async getProviderEarnings(provider: string): Promise<ProviderEarnings> {
    const address = normalizeAddress(provider);
    const now = this.clock();
    return this.read(async (tx) => {
      const analytics = (await tx.getProviderAnalytics(address)) ?? emptyProviderAnalytics(address);
      const entries = await tx.listRevenue({
        since: now - EARNINGS_WINDOW_DAYS * DAY_MS,
        provider: address,
      });
      const topMatches = await loadTopEarningMatches(tx, address, EARNINGS_TOP_MATCHES);
      return buildEarnings(analytics, entries, topMatches, now);
    });
  }

  async getProviderPerformance(provider: string): Promise<ProviderPerformance> {
    const address = normalizeAddress(provider);
    return this.read(async (tx) => {
      const analytics = (await tx.getProviderAnalytics(address)) ?? emptyProviderAnalytics(address);
      const history: { result: MatchResult; gameId: string }[] = [];
      for (const result of await tx.listMatchResults({ submitter: address, limit: PERFORMANCE_HISTORY })) {
        const match = await tx.getScheduledMatch(result.scheduledMatchId);
        if (match) history.push({ result, gameId: match.gameId });
      }
      return buildPerformance(analytics, history);
    });
  }

  // ---- internals ----

  private context(caller: string): OperationContext {
    return { caller: normalizeAddress(caller), now: this.clock(), newId: this.generateId };
  }

  /**
   * Run a paying transaction on funds already taken out of `payment`. The
   * funds are consumed on commit and returned to `payment` on abort, so a
   * coin shared by concurrent calls is never spent twice.
   */
  private async settle<T>(payment: Coin, held: Coin, fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    let value: T;
    try {
      value = await this.store.transaction(fn);
    } catch (err) {
      payment.merge(held);
      throw err;
    }
    held.drain();
    return value;
  }

  private read<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    return this.store.transaction(fn);
  }

  /** The operation has committed by now; a failing sink is only logged. */
  private async emit(event: LedgerEvent): Promise<void> {
    try {
      await this.events.publish(event);
    } catch (err) {
      log.error({ err, type: event.type }, "Event publish failed after commit");
    }
  }
}
