import { keccak256, toUtf8Bytes } from "ethers";

/**
 * Canonical JSON encoding for deterministic hashing.
 * Object keys are sorted, undefined values are dropped, no whitespace.
 */
export function canonicalEncode(value: unknown): string {
  return JSON.stringify(value, (_key, current: unknown) => {
    if (current === null || typeof current !== "object" || Array.isArray(current)) {
      return current;
    }
    const sorted: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(current).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (field !== undefined) sorted[key] = field;
    }
    return sorted;
  });
}

/**
 * keccak256 of the canonical encoding of `value`.
 */
export function hashValue(value: unknown): string {
  return keccak256(toUtf8Bytes(canonicalEncode(value)));
}

/**
 * Compute the hash chain link: H(prevHash || currentData).
 */
export function chainHash(prevHash: string, data: unknown): string {
  return keccak256(toUtf8Bytes(prevHash + canonicalEncode(data)));
}
