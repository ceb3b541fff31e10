import { keccak256, toUtf8Bytes } from "ethers";
import { canonicalEncode } from "./Encoding";

/**
 * Hash an object using keccak256 after canonical encoding.
 */
export function hashState(state: unknown): string {
  const encoded = canonicalEncode(state);
  return keccak256(toUtf8Bytes(encoded));
}

/**
 * Content address of a byte string.
 */
export function hashBytes(bytes: Uint8Array): string {
  return keccak256(bytes);
}
