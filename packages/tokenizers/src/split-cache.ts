/**
 * Memo of merge results per piece, spread over independent shards.
 *
 * Purely an accelerator: every entry can be recomputed from the merge engine
 * and always yields the same ranks, so misses, evictions and duplicate
 * computation only cost time. Entries never need invalidating because the
 * rank table never changes. Each shard is bounded and evicts its oldest
 * entry when full, so one hot shard never flushes the others.
 */
import { bucketOf, type Rank } from "@ranktok/core";

export interface SplitCacheOptions {
  readonly shards: number;
  /** Entries per shard. */
  readonly capacity: number;
}

export interface SplitCacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly size: number;
}

export class SplitCache {
  private readonly _shards: Map<string, readonly Rank[]>[];
  private readonly _capacity: number;
  private _hits = 0;
  private _misses = 0;

  constructor(options: SplitCacheOptions) {
    this._shards = Array.from({ length: Math.max(1, options.shards) }, () => new Map());
    this._capacity = Math.max(1, options.capacity);
  }

  get shardCount(): number {
    return this._shards.length;
  }

  get size(): number {
    let total = 0;
    for (const shard of this._shards) total += shard.size;
    return total;
  }

  get(piece: string): readonly Rank[] | undefined {
    return this._shardFor(piece).get(piece);
  }

  /**
   * Cached ranks for `piece`, or `compute()` stored and returned.
   * Overwriting an existing key with a recomputed value is harmless.
   */
  getOrCompute(piece: string, compute: () => readonly Rank[]): readonly Rank[] {
    const shard = this._shardFor(piece);
    const cached = shard.get(piece);
    if (cached !== undefined) {
      this._hits++;
      return cached;
    }
    this._misses++;
    const value = compute();
    if (shard.size >= this._capacity) {
      // Maps iterate in insertion order: the first key is the oldest.
      const oldest = shard.keys().next();
      if (!oldest.done) shard.delete(oldest.value);
    }
    shard.set(piece, value);
    return value;
  }

  stats(): SplitCacheStats {
    return { hits: this._hits, misses: this._misses, size: this.size };
  }

  clear(): void {
    for (const shard of this._shards) shard.clear();
    this._hits = 0;
    this._misses = 0;
  }

  private _shardFor(piece: string): Map<string, readonly Rank[]> {
    return this._shards[bucketOf(piece, this._shards.length)];
  }
}
