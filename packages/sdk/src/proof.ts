import {
  MatchData,
  MatchProof,
  PROOF_VERSION,
  decodeMatchProof,
  encodeMatchProof,
  hashMatchData,
  verifyMatchProof,
} from "@matchproof/core";

/**
 * Builds signed match proofs for one player.
 */
export class ProofBuilder {
  constructor(
    private readonly signer: string,
    private readonly signMessage: (message: string) => Promise<string>,
    private readonly now: () => number = Date.now
  ) {}

  async build(matchData: MatchData): Promise<MatchProof> {
    const proofHash = hashMatchData(matchData);
    const signature = await this.signMessage(proofHash);
    return {
      matchData,
      proofHash,
      signer: this.signer,
      signature,
      metadata: {
        version: PROOF_VERSION,
        algorithm: "keccak256",
        generatedAt: this.now(),
      },
    };
  }

  static verify(proof: MatchProof): boolean {
    return verifyMatchProof(proof);
  }

  static serialize(proof: MatchProof): Uint8Array {
    return encodeMatchProof(proof);
  }

  static deserialize(bytes: Uint8Array): MatchProof {
    return decodeMatchProof(bytes);
  }
}
