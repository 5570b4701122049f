/**
 * FNV-1a string hashing. Used to spread cache keys across shards.
 * No crypto needed.
 */

export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Bucket index in `[0, buckets)` for `key`. */
export function bucketOf(key: string, buckets: number): number {
  return fnv1a(key) % buckets;
}
