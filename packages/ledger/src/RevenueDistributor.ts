import {
  LedgerErrorCode,
  MatchResult,
  QUERY_PRICE,
  REVENUE_SHARES,
  SUBSCRIPTION_TIERS,
  Subscription,
  isSubscriptionTier,
} from "@matchproof/core";
import { LedgerTx } from "./interfaces/ILedgerStore";
import { OperationContext, ensure, found } from "./OperationContext";
import {
  loadConsumer,
  loadProvider,
  recordConsumerQuery,
  recordConsumerSubscription,
  recordProtocolPaidQuery,
  recordProtocolSubscribedQuery,
  recordProtocolSubscription,
  recordProviderQuery,
} from "./Analytics";

export interface PaymentSplit {
  provider: bigint;
  protocol: bigint;
  validator: bigint;
  /** Rounding remainder. Credited nowhere. */
  burned: bigint;
}

/**
 * Split `payment` by REVENUE_SHARES with truncating division. The
 * remainder is always less than 3 units.
 */
export function splitPayment(payment: bigint): PaymentSplit {
  const provider = (payment * REVENUE_SHARES.provider) / 100n;
  const protocol = (payment * REVENUE_SHARES.protocol) / 100n;
  const validator = (payment * REVENUE_SHARES.validator) / 100n;
  return {
    provider,
    protocol,
    validator,
    burned: payment - provider - protocol - validator,
  };
}

async function getResult(tx: LedgerTx, id: string): Promise<MatchResult> {
  return found(
    await tx.getMatchResult(id),
    LedgerErrorCode.RESULT_NOT_FOUND,
    `Match result ${id} not found`
  );
}

/**
 * Charge the caller for one query against a verified result and route the
 * payment to the submitter, the protocol treasury and the validator pool.
 */
export async function chargeQuery(
  tx: LedgerTx,
  ctx: OperationContext,
  resultId: string,
  payment: bigint
): Promise<{ result: MatchResult; split: PaymentSplit }> {
  const result = await getResult(tx, resultId);
  ensure(result.verified, LedgerErrorCode.UNVERIFIED, `Result ${result.id} is not verified`);
  ensure(
    payment >= QUERY_PRICE,
    LedgerErrorCode.INSUFFICIENT_PAYMENT,
    `Query costs ${QUERY_PRICE}, got ${payment}`
  );

  const split = splitPayment(payment);

  await tx.credit(result.submitter, split.provider);

  const registry = await tx.getRegistry();
  registry.protocolBalance += split.protocol;
  registry.validatorPool += split.validator;
  registry.totalQueries += 1;
  await tx.saveRegistry(registry);

  result.queryCount += 1;
  result.revenueEarned += split.provider;
  await tx.saveMatchResult(result);

  const provider = await loadProvider(tx, result.submitter);
  recordProviderQuery(provider, result, split.provider);
  await tx.saveProviderAnalytics(provider);

  const proto = await tx.getProtocolAnalytics();
  const consumer = await loadConsumer(tx, ctx.caller, proto);
  const firstQuery = await tx.recordConsumerQuery(ctx.caller, result.id);
  recordConsumerQuery(consumer, payment, firstQuery, ctx.now);
  await tx.saveConsumerAnalytics(consumer);

  recordProtocolPaidQuery(proto, split);
  await tx.saveProtocolAnalytics(proto);

  await tx.recordRevenue({
    id: ctx.newId(),
    resultId: result.id,
    matchId: result.matchId,
    provider: result.submitter,
    consumer: ctx.caller,
    providerShare: split.provider,
    protocolShare: split.protocol,
    validatorShare: split.validator,
    createdAt: ctx.now,
  });

  return { result, split };
}

/**
 * Serve one query from the caller's subscription. Subscribed queries earn
 * the provider nothing.
 */
export async function consumeSubscriptionQuery(
  tx: LedgerTx,
  ctx: OperationContext,
  resultId: string,
  subscriptionId: string
): Promise<{ result: MatchResult; subscription: Subscription }> {
  const subscription = found(
    await tx.getSubscription(subscriptionId),
    LedgerErrorCode.SUBSCRIPTION_NOT_FOUND,
    `Subscription ${subscriptionId} not found`
  );
  const result = await getResult(tx, resultId);

  ensure(
    subscription.subscriber === ctx.caller,
    LedgerErrorCode.NOT_OWNER,
    `Subscription ${subscription.id} belongs to another account`
  );
  ensure(
    subscription.queriesRemaining > 0,
    LedgerErrorCode.EXHAUSTED,
    `Subscription ${subscription.id} has no queries remaining`
  );
  ensure(
    ctx.now <= subscription.validUntil,
    LedgerErrorCode.EXPIRED,
    `Subscription ${subscription.id} expired at ${subscription.validUntil}`
  );
  ensure(result.verified, LedgerErrorCode.UNVERIFIED, `Result ${result.id} is not verified`);

  subscription.queriesRemaining -= 1;
  subscription.totalQueriesUsed += 1;
  await tx.saveSubscription(subscription);

  result.queryCount += 1;
  await tx.saveMatchResult(result);

  const registry = await tx.getRegistry();
  registry.totalQueries += 1;
  await tx.saveRegistry(registry);

  const provider = await loadProvider(tx, result.submitter);
  recordProviderQuery(provider, result, 0n);
  await tx.saveProviderAnalytics(provider);

  const proto = await tx.getProtocolAnalytics();
  const consumer = await loadConsumer(tx, ctx.caller, proto);
  const firstQuery = await tx.recordConsumerQuery(ctx.caller, result.id);
  recordConsumerQuery(consumer, 0n, firstQuery, ctx.now);
  await tx.saveConsumerAnalytics(consumer);

  recordProtocolSubscribedQuery(proto);
  await tx.saveProtocolAnalytics(proto);

  return { result, subscription };
}

/**
 * Sell a subscription of `tier`. The whole payment is credited to the
 * protocol treasury.
 */
export async function sellSubscription(
  tx: LedgerTx,
  ctx: OperationContext,
  tier: string,
  payment: bigint
): Promise<Subscription> {
  ensure(isSubscriptionTier(tier), LedgerErrorCode.INVALID_TIER, `Unknown subscription tier: ${tier}`);
  const terms = SUBSCRIPTION_TIERS[tier];
  ensure(
    payment >= terms.price,
    LedgerErrorCode.INSUFFICIENT_PAYMENT,
    `The ${tier} tier costs ${terms.price}, got ${payment}`
  );

  const subscription: Subscription = {
    id: ctx.newId(),
    subscriber: ctx.caller,
    tier,
    queriesRemaining: terms.quota,
    validUntil: ctx.now + terms.durationMs,
    totalQueriesUsed: 0,
    pricePaid: payment,
    createdAt: ctx.now,
  };
  await tx.saveSubscription(subscription);

  const registry = await tx.getRegistry();
  registry.protocolBalance += payment;
  await tx.saveRegistry(registry);

  const proto = await tx.getProtocolAnalytics();
  const consumer = await loadConsumer(tx, ctx.caller, proto);
  recordConsumerSubscription(consumer, subscription, ctx.now);
  await tx.saveConsumerAnalytics(consumer);

  recordProtocolSubscription(proto, tier, payment);
  await tx.saveProtocolAnalytics(proto);

  return subscription;
}
