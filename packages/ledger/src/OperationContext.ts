import { LedgerError, LedgerErrorCode } from "@matchproof/core";

/**
 * Who is calling and when, resolved once per operation by the Ledger.
 */
export interface OperationContext {
  caller: string;
  now: number;
  newId: () => string;
}

/** Throw `code` unless `condition` holds. */
export function ensure(
  condition: boolean,
  code: LedgerErrorCode,
  message: string
): asserts condition {
  if (!condition) {
    throw new LedgerError(code, message);
  }
}

export function found<T>(value: T | undefined, code: LedgerErrorCode, message: string): T {
  if (value === undefined) {
    throw new LedgerError(code, message);
  }
  return value;
}
