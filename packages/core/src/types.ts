/**
 * Core types for the ranktok system.
 */

// ── Ranks and bytes ────────────────────────────────────────────────────────

/** Token id. Also the merge priority: lower ranks merge first. */
export type Rank = number;

/**
 * A byte sequence held in a string, one code unit per byte (0..255).
 *
 * Used as the key type of the encoder table, since `Map` compares strings by
 * value but byte arrays by identity.
 */
export type ByteString = string;

// ── Special-token policy ───────────────────────────────────────────────────

export type SpecialPolicy =
  | { readonly _tag: "AllowAll" }
  | { readonly _tag: "AllowSet"; readonly allowed: ReadonlySet<string> }
  | { readonly _tag: "AllowNone" };

export const AllowAll: SpecialPolicy = { _tag: "AllowAll" };
export const AllowNone: SpecialPolicy = { _tag: "AllowNone" };

export function allowSet(literals: Iterable<string>): SpecialPolicy {
  return { _tag: "AllowSet", allowed: new Set(literals) };
}

// ── Decode mode ────────────────────────────────────────────────────────────

/** `strict` fails on invalid UTF-8; `lossy` substitutes U+FFFD. */
export type DecodeMode = "strict" | "lossy";

// ── Encoding parameters ────────────────────────────────────────────────────

/**
 * Everything needed to construct an encoding. Plain data, so it can be
 * handed to worker threads by structured clone.
 */
export interface EncodingParams {
  /** Should make the expected behaviour clear, including which special tokens exist. */
  readonly name: string;
  /** Segmentation pattern source, compiled with the `gu` flags. */
  readonly patStr: string;
  readonly mergeableRanks: ReadonlyMap<ByteString, Rank>;
  readonly specialTokens: Readonly<Record<string, Rank>>;
  /** When set, ordinary + special token count must equal this. */
  readonly explicitNVocab?: number;
}

/** Tunables of an encoding instance that do not affect its output. */
export interface EncodingOptions {
  readonly splitCacheShards: number;
  readonly splitCacheCapacity: number;
  readonly batchConcurrency: number;
}

export const defaultEncodingOptions: EncodingOptions = {
  splitCacheShards: 16,
  splitCacheCapacity: 4096,
  batchConcurrency: 4,
};
