import {
  LedgerErrorCode,
  MatchResult,
  MatchState,
  NO_WINNER,
  PlayerStats,
  ScheduledMatch,
} from "@matchproof/core";
import { LedgerTx } from "./interfaces/ILedgerStore";
import { VerificationPolicy } from "./interfaces/IVerificationPolicy";
import { OperationContext, ensure, found } from "./OperationContext";
import {
  loadProvider,
  recordProviderScheduled,
  recordProviderSubmission,
  recordProviderVerified,
} from "./Analytics";

export interface ScheduleParams {
  matchId: string;
  gameId: string;
  opponent: string;
  /** Epoch ms. Must be in the future when scheduling. */
  scheduledTime: number;
}

export interface ResultParams {
  winner: string;
  statsA: PlayerStats;
  statsB: PlayerStats;
  contentBlobId: string;
  proofHash: string;
}

function isValidStats(stats: PlayerStats): boolean {
  return [stats.kills, stats.deaths, stats.score].every(
    (n) => Number.isSafeInteger(n) && n >= 0
  );
}

async function getMatch(tx: LedgerTx, id: string): Promise<ScheduledMatch> {
  return found(
    await tx.getScheduledMatch(id),
    LedgerErrorCode.MATCH_NOT_FOUND,
    `Scheduled match ${id} not found`
  );
}

/**
 * Register a match before it starts. The caller becomes playerA.
 */
export async function scheduleMatch(
  tx: LedgerTx,
  ctx: OperationContext,
  params: ScheduleParams
): Promise<ScheduledMatch> {
  ensure(
    params.matchId !== "" && params.gameId !== "" && params.opponent !== "",
    LedgerErrorCode.INVALID_INPUT,
    "matchId, gameId and opponent are required"
  );
  ensure(
    params.opponent !== ctx.caller,
    LedgerErrorCode.INVALID_INPUT,
    "Cannot schedule a match against yourself"
  );
  ensure(
    (await tx.findScheduledMatchId(params.matchId)) === undefined,
    LedgerErrorCode.DUPLICATE_MATCH,
    `Match ${params.matchId} is already scheduled`
  );
  ensure(
    Number.isSafeInteger(params.scheduledTime) && params.scheduledTime > ctx.now,
    LedgerErrorCode.SCHEDULE_IN_PAST,
    "Scheduled time must be in the future"
  );

  const match: ScheduledMatch = {
    id: ctx.newId(),
    matchId: params.matchId,
    gameId: params.gameId,
    playerA: ctx.caller,
    playerB: params.opponent,
    scheduledTime: params.scheduledTime,
    state: MatchState.SCHEDULED,
    locked: false,
    createdAt: ctx.now,
  };
  await tx.saveScheduledMatch(match);

  const registry = await tx.getRegistry();
  registry.totalMatchesScheduled += 1;
  await tx.saveRegistry(registry);

  const provider = await loadProvider(tx, match.playerA);
  recordProviderScheduled(provider);
  await tx.saveProviderAnalytics(provider);

  const proto = await tx.getProtocolAnalytics();
  proto.totalMatchesScheduled += 1;
  await tx.saveProtocolAnalytics(proto);

  return match;
}

/**
 * Lock a match once its start time has arrived. Results can only be
 * submitted for a locked match.
 */
export async function lockMatch(
  tx: LedgerTx,
  ctx: OperationContext,
  scheduledMatchId: string
): Promise<ScheduledMatch> {
  const match = await getMatch(tx, scheduledMatchId);
  ensure(
    ctx.now >= match.scheduledTime,
    LedgerErrorCode.NOT_YET_STARTABLE,
    `Match ${match.matchId} cannot be locked before ${match.scheduledTime}`
  );
  ensure(!match.locked, LedgerErrorCode.ALREADY_LOCKED, `Match ${match.matchId} is already locked`);

  match.locked = true;
  await tx.saveScheduledMatch(match);
  return match;
}

/**
 * Record the result of a locked match. Only a participant may submit, and
 * only once per match.
 */
export async function submitResult(
  tx: LedgerTx,
  ctx: OperationContext,
  scheduledMatchId: string,
  params: ResultParams
): Promise<{ match: ScheduledMatch; result: MatchResult }> {
  const match = await getMatch(tx, scheduledMatchId);
  ensure(
    ctx.caller === match.playerA || ctx.caller === match.playerB,
    LedgerErrorCode.NOT_PARTICIPANT,
    `${ctx.caller} is not a participant in match ${match.matchId}`
  );
  ensure(match.locked, LedgerErrorCode.NOT_LOCKED, `Match ${match.matchId} is not locked`);
  ensure(
    match.state === MatchState.SCHEDULED &&
      (await tx.findMatchResultId(match.matchId)) === undefined,
    LedgerErrorCode.ALREADY_COMPLETED,
    `Match ${match.matchId} already has a result`
  );
  ensure(
    params.winner === match.playerA || params.winner === match.playerB || params.winner === NO_WINNER,
    LedgerErrorCode.INVALID_WINNER,
    "Winner must be a participant or the no-winner sentinel"
  );
  ensure(
    isValidStats(params.statsA) && isValidStats(params.statsB),
    LedgerErrorCode.INVALID_INPUT,
    "Stats must be non-negative integers"
  );
  ensure(
    params.contentBlobId !== "" && params.proofHash !== "",
    LedgerErrorCode.INVALID_INPUT,
    "contentBlobId and proofHash are required"
  );

  const result: MatchResult = {
    id: ctx.newId(),
    matchId: match.matchId,
    scheduledMatchId: match.id,
    submitter: ctx.caller,
    winner: params.winner,
    statsA: { ...params.statsA },
    statsB: { ...params.statsB },
    contentBlobId: params.contentBlobId,
    proofHash: params.proofHash,
    verified: false,
    verifier: null,
    queryCount: 0,
    revenueEarned: 0n,
    submittedAt: ctx.now,
    verifiedAt: null,
  };
  await tx.saveMatchResult(result);

  match.state = MatchState.COMPLETED;
  await tx.saveScheduledMatch(match);

  const registry = await tx.getRegistry();
  registry.totalMatchesCompleted += 1;
  await tx.saveRegistry(registry);

  const proto = await tx.getProtocolAnalytics();
  const provider = await loadProvider(tx, result.submitter);
  if (provider.totalMatchesSubmitted === 0) {
    proto.totalProviders += 1;
  }
  recordProviderSubmission(provider, result, ctx.now);
  await tx.saveProviderAnalytics(provider);

  proto.totalMatchesCompleted += 1;
  await tx.saveProtocolAnalytics(proto);

  return { match, result };
}

/**
 * Mark a submitted result verified. `verified` flips exactly once.
 */
export async function verifyResult(
  tx: LedgerTx,
  ctx: OperationContext,
  policy: VerificationPolicy,
  scheduledMatchId: string,
  resultId: string
): Promise<{ match: ScheduledMatch; result: MatchResult }> {
  const match = await getMatch(tx, scheduledMatchId);
  const result = found(
    await tx.getMatchResult(resultId),
    LedgerErrorCode.RESULT_NOT_FOUND,
    `Match result ${resultId} not found`
  );
  ensure(
    policy.canVerify(ctx.caller, result, match),
    LedgerErrorCode.VERIFIER_NOT_AUTHORIZED,
    `${ctx.caller} may not verify results`
  );
  ensure(!result.verified, LedgerErrorCode.ALREADY_VERIFIED, `Result ${result.id} is already verified`);
  ensure(
    result.scheduledMatchId === match.id,
    LedgerErrorCode.MISMATCH,
    `Result ${result.id} does not belong to match ${match.matchId}`
  );

  result.verified = true;
  result.verifier = ctx.caller;
  result.verifiedAt = ctx.now;
  await tx.saveMatchResult(result);

  match.state = MatchState.VERIFIED;
  await tx.saveScheduledMatch(match);

  const provider = await loadProvider(tx, result.submitter);
  recordProviderVerified(provider);
  await tx.saveProviderAnalytics(provider);

  const proto = await tx.getProtocolAnalytics();
  proto.totalMatchesVerified += 1;
  await tx.saveProtocolAnalytics(proto);

  return { match, result };
}
