export { Ledger } from "./Ledger";
export type { LedgerOptions, PaidQueryReceipt, SubscribedQueryReceipt } from "./Ledger";
export { Coin } from "./Coin";
export { systemClock } from "./Clock";
export type { Clock } from "./Clock";
export { MemoryLedgerStore } from "./MemoryLedgerStore";
export { MemoryEventSink, FanoutEventSink, nullEventSink } from "./EventSinks";
export { openVerification, ValidatorAllowlist } from "./VerificationPolicies";
export { splitPayment } from "./RevenueDistributor";
export type { PaymentSplit } from "./RevenueDistributor";
export type { ScheduleParams, ResultParams } from "./MatchLifecycle";
export { buildQueryView } from "./QueryView";
export type { QueryView, OutcomeView, StatsView, FullView } from "./QueryView";
export {
  computeWinRate,
  averageOf,
  emptyRegistry,
  emptyProtocolAnalytics,
  emptyProviderAnalytics,
  emptyConsumerAnalytics,
} from "./Analytics";
export type { LedgerStore, LedgerTx, ListOptions } from "./interfaces/ILedgerStore";
export type { LedgerEventSink } from "./interfaces/ILedgerEventSink";
export type { VerificationPolicy } from "./interfaces/IVerificationPolicy";
export type {
  FormMark,
  GamePerformance,
  ProviderEarnings,
  ProviderPerformance,
  RevenuePoint,
  TopEarningMatch,
} from "./Reports";
