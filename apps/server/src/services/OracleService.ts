import {
  BlobStore,
  LedgerError,
  LedgerErrorCode,
  MatchProof,
  MatchResult,
  PROOF_CONTENT_TYPE,
  QueryKind,
  Subscription,
  decodeMatchProof,
  encodeMatchProof,
  isMatchProof,
  normalizeAddress,
  verifyMatchProof,
} from "@matchproof/core";
import { Coin, Ledger, PaidQueryReceipt } from "@matchproof/ledger";
import log from "../logger";

export interface SubmittedProof {
  result: MatchResult;
  blobId: string;
}

/**
 * Server-side flows that combine the ledger with proof storage. Proofs are
 * checked and uploaded before the result is recorded; the ledger only keeps
 * the blob id and the proof hash.
 */
export class OracleService {
  constructor(
    readonly ledger: Ledger,
    private readonly blobs: BlobStore
  ) {}

  async submitProof(caller: string, scheduledMatchId: string, proof: unknown): Promise<SubmittedProof> {
    if (!isMatchProof(proof)) {
      throw new LedgerError(LedgerErrorCode.INVALID_INPUT, "Body does not contain a match proof");
    }
    if (!verifyMatchProof(proof)) {
      throw new LedgerError(LedgerErrorCode.INVALID_INPUT, "Proof hash or signature does not verify");
    }
    if (normalizeAddress(proof.signer) !== normalizeAddress(caller)) {
      throw new LedgerError(LedgerErrorCode.INVALID_INPUT, "Proof was not signed by the caller");
    }

    const match = await this.ledger.getScheduledMatch(scheduledMatchId);
    if (!match) {
      throw new LedgerError(LedgerErrorCode.MATCH_NOT_FOUND, `Scheduled match ${scheduledMatchId} not found`);
    }
    const data = proof.matchData;
    const samePlayers =
      normalizeAddress(data.playerA) === match.playerA &&
      normalizeAddress(data.playerB) === match.playerB;
    if (data.matchId !== match.matchId || data.gameId !== match.gameId || !samePlayers) {
      throw new LedgerError(
        LedgerErrorCode.INVALID_INPUT,
        `Proof describes a different match than ${match.matchId}`
      );
    }

    const blobId = await this.blobs.put(encodeMatchProof(proof), PROOF_CONTENT_TYPE);
    log.info({ scheduledMatchId, blobId }, "Match proof stored");

    const result = await this.ledger.submitResult(caller, scheduledMatchId, {
      winner: data.winner,
      statsA: data.statsA,
      statsB: data.statsB,
      contentBlobId: blobId,
      proofHash: proof.proofHash,
    });
    return { result, blobId };
  }

  /** The stored proof behind a result. */
  async getProof(resultId: string): Promise<MatchProof> {
    const result = await this.ledger.getMatchResult(resultId);
    if (!result) {
      throw new LedgerError(LedgerErrorCode.RESULT_NOT_FOUND, `Result ${resultId} not found`);
    }
    return decodeMatchProof(await this.blobs.get(result.contentBlobId));
  }

  /**
   * Payment arrives as an amount the caller has already settled off-ledger;
   * it is wrapped in a Coin and handed to the ledger as-is.
   */
  queryPaid(caller: string, resultId: string, amount: bigint, queryKind: QueryKind): Promise<PaidQueryReceipt> {
    return this.ledger.queryPaid(caller, resultId, new Coin(amount), queryKind);
  }

  createSubscription(caller: string, tier: string, amount: bigint): Promise<Subscription> {
    return this.ledger.createSubscription(caller, tier, new Coin(amount));
  }
}
