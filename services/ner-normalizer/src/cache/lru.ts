import { LRUCache } from "lru-cache";

export function createTTLCache<
  K extends NonNullable<unknown>,
  V extends NonNullable<unknown>,
>(
  ttlMs: number,
  max = 1000,
): LRUCache<K, V> {
  return new LRUCache<K, V>({
    max,
    ttl: ttlMs,
    updateAgeOnGet: true,
    updateAgeOnHas: true,
  });
}

/** Wraps a lookup so that misses (undefined results) are remembered too. */
export function memoizeLookup(
  lookup: (key: string) => string | undefined,
  cache: LRUCache<string, { value: string | undefined }>,
): (key: string) => string | undefined {
  return (key: string) => {
    const hit = cache.get(key);
    if (hit) return hit.value;
    const value = lookup(key);
    cache.set(key, { value });
    return value;
  };
}
