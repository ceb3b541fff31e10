import { LedgerEvent } from "@matchproof/core";

/**
 * Receives events after the transaction that produced them has committed.
 */
export interface LedgerEventSink {
  publish(event: LedgerEvent): Promise<void>;
}
