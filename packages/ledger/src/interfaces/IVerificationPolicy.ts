import { MatchResult, ScheduledMatch } from "@matchproof/core";

/**
 * Decides who may verify a submitted result.
 */
export interface VerificationPolicy {
  canVerify(verifier: string, result: MatchResult, match: ScheduledMatch): boolean;
}
