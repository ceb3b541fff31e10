import { Generated, Selectable, Insertable, Updateable } from "kysely";

// Amount columns are decimal strings of base units (varchar(78)).

// ---- registry (single row, id = 1) ----

export interface RegistryTable {
  id: number;
  total_matches_scheduled: number;
  total_matches_completed: number;
  total_queries: number;
  protocol_balance: string;
  validator_pool: string;
}

export type RegistryRow = Selectable<RegistryTable>;

// ---- scheduled_matches ----

export interface ScheduledMatchesTable {
  id: string;
  match_id: string;
  game_id: string;
  player_a: string;
  player_b: string;
  scheduled_time: Date;
  state: string;
  locked: boolean;
  created_at: Date;
}

export type ScheduledMatchRow = Selectable<ScheduledMatchesTable>;
export type NewScheduledMatchRow = Insertable<ScheduledMatchesTable>;
export type ScheduledMatchUpdate = Updateable<ScheduledMatchesTable>;

// ---- match_results ----

export interface MatchResultsTable {
  id: string;
  match_id: string;
  scheduled_match_id: string;
  submitter: string;
  winner: string;
  stats_a: string; // JSON
  stats_b: string; // JSON
  content_blob_id: string;
  proof_hash: string;
  verified: boolean;
  verifier: string | null;
  query_count: number;
  revenue_earned: string;
  submitted_at: Date;
  verified_at: Date | null;
}

export type MatchResultRow = Selectable<MatchResultsTable>;
export type NewMatchResultRow = Insertable<MatchResultsTable>;

// ---- subscriptions ----

export interface SubscriptionsTable {
  id: string;
  subscriber: string;
  tier: string;
  queries_remaining: string; // int8, pg returns it as a string
  valid_until: Date;
  total_queries_used: number;
  price_paid: string;
  created_at: Date;
}

export type SubscriptionRow = Selectable<SubscriptionsTable>;
export type NewSubscriptionRow = Insertable<SubscriptionsTable>;

// ---- provider_analytics ----

export interface ProviderAnalyticsTable {
  provider: string;
  total_matches_submitted: number;
  total_matches_verified: number;
  matches_scheduled: number;
  matches_completed: number;
  total_revenue_earned: string;
  total_queries_served: number;
  average_revenue_per_match: string;
  highest_earning_match_revenue: string;
  win_count: number;
  loss_count: number;
  draw_count: number;
  win_rate: number;
  first_match_at: Date | null;
  last_match_at: Date | null;
}

export type ProviderAnalyticsRow = Selectable<ProviderAnalyticsTable>;

// ---- consumer_analytics ----

export interface ConsumerAnalyticsTable {
  consumer: string;
  total_queries_made: number;
  paid_queries: number;
  subscribed_queries: number;
  unique_matches_queried: number;
  total_spent: string;
  average_cost_per_query: string;
  active_subscription_id: string | null;
  subscription_tier: string | null;
  first_query_at: Date | null;
  last_query_at: Date | null;
  member_since: Date | null;
}

export type ConsumerAnalyticsRow = Selectable<ConsumerAnalyticsTable>;

// ---- consumer_match_queries ----

export interface ConsumerMatchQueriesTable {
  consumer: string;
  match_result_id: string;
  created_at: Generated<Date>;
}

// ---- protocol_analytics (single row, id = 1) ----

export interface ProtocolAnalyticsTable {
  id: number;
  total_matches_scheduled: number;
  total_matches_completed: number;
  total_matches_verified: number;
  total_queries_processed: number;
  paid_queries: number;
  subscribed_queries: number;
  total_protocol_revenue: string;
  total_provider_payouts: string;
  total_validator_rewards: string;
  total_providers: number;
  total_consumers: number;
  basic_subscribers: number;
  pro_subscribers: number;
  enterprise_subscribers: number;
  subscription_revenue: string;
}

export type ProtocolAnalyticsRow = Selectable<ProtocolAnalyticsTable>;

// ---- account_balances ----

export interface AccountBalancesTable {
  address: string;
  balance: string;
}

// ---- master Database interface ----

// ---- revenue log ----

export interface RevenueEntriesTable {
  id: string;
  match_result_id: string;
  match_id: string;
  provider: string;
  consumer: string;
  provider_share: string;
  protocol_share: string;
  validator_share: string;
  created_at: Date;
}
export type RevenueEntryRow = Selectable<RevenueEntriesTable>;

export interface Database {
  registry: RegistryTable;
  scheduled_matches: ScheduledMatchesTable;
  match_results: MatchResultsTable;
  subscriptions: SubscriptionsTable;
  provider_analytics: ProviderAnalyticsTable;
  consumer_analytics: ConsumerAnalyticsTable;
  consumer_match_queries: ConsumerMatchQueriesTable;
  protocol_analytics: ProtocolAnalyticsTable;
  account_balances: AccountBalancesTable;
  revenue_entries: RevenueEntriesTable;
}
