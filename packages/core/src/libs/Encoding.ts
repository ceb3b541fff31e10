/**
 * Canonical JSON encoding for deterministic hashing.
 * Keys are sorted alphabetically, no whitespace, no undefined values.
 * bigint values are written as decimal strings.
 */
export function canonicalEncode(obj: unknown): string {
  return JSON.stringify(obj, (_, value) => {
    if (typeof value === "bigint") {
      return value.toString();
    }
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return Object.keys(value)
        .sort()
        .reduce<Record<string, unknown>>((sorted, key) => {
          if (value[key] !== undefined) {
            sorted[key] = value[key];
          }
          return sorted;
        }, {});
    }
    return value;
  });
}

/**
 * JSON-safe copy of a ledger record: bigint fields become decimal strings.
 */
export type Serialized<T> = T extends bigint
  ? string
  : T extends (infer U)[]
    ? Serialized<U>[]
    : T extends object
      ? { [K in keyof T]: Serialized<T[K]> }
      : T;

export function serialize<T>(value: T): Serialized<T>;
export function serialize(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map((v) => serialize(v));
  }
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      out[key] = serialize(v);
    }
    return out;
  }
  return value;
}
