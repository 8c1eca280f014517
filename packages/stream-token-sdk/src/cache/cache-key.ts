import { createHash } from 'node:crypto';

const byKey = ([a]: readonly [string, unknown], [b]: readonly [string, unknown]): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Rebuilds objects with their keys sorted so that serialisation does not
 * depend on property order. Arrays keep their order.
 *
 * @throws TypeError when the value contains a cycle
 */
export const canonicalize = (
  value: unknown,
  ancestors: ReadonlySet<object> = new Set()
): unknown => {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (ancestors.has(value)) {
    throw new TypeError('Cannot canonicalize a circular structure');
  }
  const path = new Set(ancestors).add(value);
  if (Array.isArray(value)) {
    return value.map((item: unknown) => canonicalize(item, path));
  }
  return Object.fromEntries(
    Object.entries(value)
      .sort(byKey)
      .map(([key, child]) => [key, canonicalize(child, path)])
  );
};

/**
 * Derives a deterministic 64-bit cache key from an identity tuple.
 *
 * The key is the first 16 hex characters of the SHA-256 digest of the
 * canonical JSON of the parts. Collisions are possible and not detected.
 *
 * Throws when a part cannot be serialised (a BigInt, a cycle).
 *
 * @param parts - The identity tuple, e.g. `[tenant, clientId]`
 * @returns 16 lowercase hex characters
 *
 * @example
 * ```typescript
 * generateCacheKey('my-tenant', { a: 1, b: 2 }) === generateCacheKey('my-tenant', { b: 2, a: 1 }); // true
 * ```
 */
export const generateCacheKey = (...parts: readonly unknown[]): string =>
  createHash('sha256').update(JSON.stringify(canonicalize(parts))).digest('hex').slice(0, 16);
