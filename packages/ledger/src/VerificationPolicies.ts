import { VerificationPolicy } from "./interfaces/IVerificationPolicy";

/** Any caller may verify any result. */
export const openVerification: VerificationPolicy = {
  canVerify: () => true,
};

/**
 * Only the listed validator addresses may verify. Addresses compare
 * case-insensitively.
 */
export class ValidatorAllowlist implements VerificationPolicy {
  private readonly validators: Set<string>;

  constructor(validators: Iterable<string>) {
    this.validators = new Set(Array.from(validators, (v) => v.toLowerCase()));
  }

  canVerify(verifier: string): boolean {
    return this.validators.has(verifier.toLowerCase());
  }

  list(): string[] {
    return Array.from(this.validators);
  }
}
