import { MatchResult, QueryKind, ScheduledMatch, Subscription, SubscriptionTier } from "./ledger";

export type LedgerEventType =
  | "match.scheduled"
  | "match.locked"
  | "result.submitted"
  | "result.verified"
  | "query.paid"
  | "query.subscribed"
  | "subscription.created";

interface EventBase<T extends LedgerEventType, P> {
  type: T;
  timestamp: number;
  payload: P;
}

export type MatchScheduledEvent = EventBase<"match.scheduled", { match: ScheduledMatch }>;

export type MatchLockedEvent = EventBase<"match.locked", { match: ScheduledMatch }>;

export type ResultSubmittedEvent = EventBase<"result.submitted", { result: MatchResult }>;

export type ResultVerifiedEvent = EventBase<"result.verified", { result: MatchResult }>;

export type QueryPaidEvent = EventBase<
  "query.paid",
  {
    resultId: string;
    matchId: string;
    consumer: string;
    provider: string;
    queryKind: QueryKind;
    payment: bigint;
    providerShare: bigint;
    protocolShare: bigint;
    validatorShare: bigint;
  }
>;

export type QuerySubscribedEvent = EventBase<
  "query.subscribed",
  {
    resultId: string;
    matchId: string;
    consumer: string;
    subscriptionId: string;
    queryKind: QueryKind;
    queriesRemaining: number;
  }
>;

export type SubscriptionCreatedEvent = EventBase<
  "subscription.created",
  { subscription: Subscription; tier: SubscriptionTier }
>;

export type LedgerEvent =
  | MatchScheduledEvent
  | MatchLockedEvent
  | ResultSubmittedEvent
  | ResultVerifiedEvent
  | QueryPaidEvent
  | QuerySubscribedEvent
  | SubscriptionCreatedEvent;
