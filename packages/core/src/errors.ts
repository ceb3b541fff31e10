/**
 * Abort reasons. Every failed ledger operation throws a LedgerError and
 * none of its effects are committed.
 */
export enum LedgerErrorKind {
  DUPLICATE_ENTITY = "duplicate_entity",
  NOT_AUTHORIZED = "not_authorized",
  PRECONDITION_NOT_MET = "precondition_not_met",
  INSUFFICIENT_PAYMENT = "insufficient_payment",
  RESOURCE_EXHAUSTED = "resource_exhausted",
  RESOURCE_EXPIRED = "resource_expired",
  NOT_FOUND = "not_found",
  INVALID_ARGUMENT = "invalid_argument",
}

export enum LedgerErrorCode {
  DUPLICATE_MATCH = "DUPLICATE_MATCH",
  SCHEDULE_IN_PAST = "SCHEDULE_IN_PAST",
  NOT_YET_STARTABLE = "NOT_YET_STARTABLE",
  ALREADY_LOCKED = "ALREADY_LOCKED",
  NOT_PARTICIPANT = "NOT_PARTICIPANT",
  NOT_LOCKED = "NOT_LOCKED",
  ALREADY_COMPLETED = "ALREADY_COMPLETED",
  ALREADY_VERIFIED = "ALREADY_VERIFIED",
  MISMATCH = "MISMATCH",
  VERIFIER_NOT_AUTHORIZED = "VERIFIER_NOT_AUTHORIZED",
  UNVERIFIED = "UNVERIFIED",
  INSUFFICIENT_PAYMENT = "INSUFFICIENT_PAYMENT",
  NOT_OWNER = "NOT_OWNER",
  EXHAUSTED = "EXHAUSTED",
  EXPIRED = "EXPIRED",
  INVALID_TIER = "INVALID_TIER",
  INVALID_WINNER = "INVALID_WINNER",
  INVALID_INPUT = "INVALID_INPUT",
  MATCH_NOT_FOUND = "MATCH_NOT_FOUND",
  RESULT_NOT_FOUND = "RESULT_NOT_FOUND",
  SUBSCRIPTION_NOT_FOUND = "SUBSCRIPTION_NOT_FOUND",
}

const KIND_BY_CODE: Record<LedgerErrorCode, LedgerErrorKind> = {
  [LedgerErrorCode.DUPLICATE_MATCH]: LedgerErrorKind.DUPLICATE_ENTITY,
  [LedgerErrorCode.SCHEDULE_IN_PAST]: LedgerErrorKind.PRECONDITION_NOT_MET,
  [LedgerErrorCode.NOT_YET_STARTABLE]: LedgerErrorKind.PRECONDITION_NOT_MET,
  [LedgerErrorCode.ALREADY_LOCKED]: LedgerErrorKind.PRECONDITION_NOT_MET,
  [LedgerErrorCode.NOT_PARTICIPANT]: LedgerErrorKind.NOT_AUTHORIZED,
  [LedgerErrorCode.NOT_LOCKED]: LedgerErrorKind.PRECONDITION_NOT_MET,
  [LedgerErrorCode.ALREADY_COMPLETED]: LedgerErrorKind.PRECONDITION_NOT_MET,
  [LedgerErrorCode.ALREADY_VERIFIED]: LedgerErrorKind.PRECONDITION_NOT_MET,
  [LedgerErrorCode.MISMATCH]: LedgerErrorKind.PRECONDITION_NOT_MET,
  [LedgerErrorCode.VERIFIER_NOT_AUTHORIZED]: LedgerErrorKind.NOT_AUTHORIZED,
  [LedgerErrorCode.UNVERIFIED]: LedgerErrorKind.PRECONDITION_NOT_MET,
  [LedgerErrorCode.INSUFFICIENT_PAYMENT]: LedgerErrorKind.INSUFFICIENT_PAYMENT,
  [LedgerErrorCode.NOT_OWNER]: LedgerErrorKind.NOT_AUTHORIZED,
  [LedgerErrorCode.EXHAUSTED]: LedgerErrorKind.RESOURCE_EXHAUSTED,
  [LedgerErrorCode.EXPIRED]: LedgerErrorKind.RESOURCE_EXPIRED,
  [LedgerErrorCode.INVALID_TIER]: LedgerErrorKind.INVALID_ARGUMENT,
  [LedgerErrorCode.INVALID_WINNER]: LedgerErrorKind.INVALID_ARGUMENT,
  [LedgerErrorCode.INVALID_INPUT]: LedgerErrorKind.INVALID_ARGUMENT,
  [LedgerErrorCode.MATCH_NOT_FOUND]: LedgerErrorKind.NOT_FOUND,
  [LedgerErrorCode.RESULT_NOT_FOUND]: LedgerErrorKind.NOT_FOUND,
  [LedgerErrorCode.SUBSCRIPTION_NOT_FOUND]: LedgerErrorKind.NOT_FOUND,
};

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly kind: LedgerErrorKind;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.kind = KIND_BY_CODE[code];
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}
