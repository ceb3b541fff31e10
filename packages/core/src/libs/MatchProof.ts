import { PlayerStats } from "../types/ledger";
import { hashState } from "./Crypto";
import { canonicalEncode } from "./Encoding";
import { verifySignature } from "../validation";

export const PROOF_VERSION = "1.0.0";
export const PROOF_CONTENT_TYPE = "application/json";

/** What happened in a match, as attested by one of its players. */
export interface MatchData {
  gameId: string;
  matchId: string;
  playerA: string;
  playerB: string;
  /** A player address, or NO_WINNER for a draw */
  winner: string;
  statsA: PlayerStats;
  statsB: PlayerStats;
  playedAt: number;
  /** Free-form game detail carried in the proof document only */
  details?: Record<string, unknown>;
}

/**
 * The document stored in the blob store for every submitted result.
 * `proofHash` is the keccak256 of the canonical encoding of `matchData`;
 * `signature` is the signer's EIP-191 signature over `proofHash`.
 */
export interface MatchProof {
  matchData: MatchData;
  proofHash: string;
  signer: string;
  signature: string;
  metadata: {
    version: string;
    algorithm: "keccak256";
    generatedAt: number;
  };
}

export function hashMatchData(matchData: MatchData): string {
  return hashState(matchData);
}

/**
 * Check that `proof.proofHash` matches its data and that `proof.signer`
 * signed it.
 */
export function verifyMatchProof(proof: MatchProof): boolean {
  if (hashMatchData(proof.matchData) !== proof.proofHash) {
    return false;
  }
  return verifySignature(proof.signer, proof.proofHash, proof.signature);
}

export function encodeMatchProof(proof: MatchProof): Uint8Array {
  return new TextEncoder().encode(canonicalEncode(proof));
}

export function decodeMatchProof(bytes: Uint8Array): MatchProof {
  const parsed: unknown = JSON.parse(new TextDecoder().decode(bytes));
  if (!isMatchProof(parsed)) {
    throw new Error("Blob is not a match proof");
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStats(value: unknown): value is PlayerStats {
  return (
    isRecord(value) &&
    typeof value.kills === "number" &&
    typeof value.deaths === "number" &&
    typeof value.score === "number"
  );
}

export function isMatchData(value: unknown): value is MatchData {
  return (
    isRecord(value) &&
    typeof value.gameId === "string" &&
    typeof value.matchId === "string" &&
    typeof value.playerA === "string" &&
    typeof value.playerB === "string" &&
    typeof value.winner === "string" &&
    isStats(value.statsA) &&
    isStats(value.statsB) &&
    typeof value.playedAt === "number" &&
    (value.details === undefined || isRecord(value.details))
  );
}

/** Shape check for a proof received over the wire. */
export function isMatchProof(value: unknown): value is MatchProof {
  if (!isRecord(value) || !isRecord(value.metadata)) return false;
  return (
    isMatchData(value.matchData) &&
    typeof value.proofHash === "string" &&
    typeof value.signer === "string" &&
    typeof value.signature === "string" &&
    typeof value.metadata.version === "string" &&
    value.metadata.algorithm === "keccak256" &&
    typeof value.metadata.generatedAt === "number"
  );
}
