// Connection
export {
  db,
  closeDb,
  configureDatabase,
  openDatabase,
  getPoolConfig,
  readDatabaseSettings,
  DEFAULT_DATABASE_URL,
} from "./database";
export type { DatabaseSettings, DatabaseSsl } from "./database";

// Types
export type {
  Database,
  RegistryTable,
  RegistryRow,
  ScheduledMatchesTable,
  ScheduledMatchRow,
  MatchResultsTable,
  MatchResultRow,
  SubscriptionsTable,
  SubscriptionRow,
  ProviderAnalyticsTable,
  ConsumerAnalyticsTable,
  ConsumerMatchQueriesTable,
  ProtocolAnalyticsTable,
  AccountBalancesTable,
  RevenueEntriesTable,
  RevenueEntryRow,
} from "./types";

// Models
export {
  getRegistry,
  saveRegistry,
  getProtocolAnalytics,
  saveProtocolAnalytics,
} from "./models/registry";

export {
  findScheduledMatchById,
  findScheduledMatchIdByMatchId,
  saveScheduledMatch,
  listScheduledMatches,
} from "./models/scheduledMatches";

export {
  findMatchResultById,
  findMatchResultIdByMatchId,
  saveMatchResult,
  listMatchResults,
  listTopEarningResults,
} from "./models/matchResults";

export { recordRevenueEntry, listRevenueEntries } from "./models/revenue";

export {
  findSubscriptionById,
  saveSubscription,
  listSubscriptionsBySubscriber,
} from "./models/subscriptions";

export {
  findProviderAnalytics,
  saveProviderAnalytics,
  listTopProviders,
  findConsumerAnalytics,
  saveConsumerAnalytics,
  recordConsumerQuery,
} from "./models/analytics";

export { getAccountBalance, creditAccount } from "./models/accounts";

// Migration
export { migrateToLatest, summarizeMigrations } from "./migrate";
export type { MigrateOptions, MigrationReport } from "./migrate";

// Redis
export {
  createRedisClient,
  publishLedgerEvent,
  getRecentLedgerEvents,
  LEDGER_EVENTS_CHANNEL,
} from "./redis";
