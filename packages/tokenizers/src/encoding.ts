/**
 * Encode/decode orchestrator.
 *
 * An `Encoding` aggregates the rank tables, the two patterns and the split
 * cache. It is built once, never changes apart from its cache, and can be
 * shared by every caller for its whole lifetime.
 */
import { Effect } from "effect";
import {
  AllowNone,
  ConfigError,
  DecodeError,
  defaultEncodingOptions,
  EncodeError,
  type ByteString,
  type DecodeMode,
  type EncodingOptions,
  type EncodingParams,
  type Rank,
  type SpecialPolicy,
  type SpecialTokenViolation,
  type Tokenizer,
  type WorkerError,
} from "@ranktok/core";
import { bytesToByteString, byteStringToBytes, concatBytes, utf8ByteString } from "./bytes.js";
import { bytePairMerge } from "./merge.js";
import { RankTable } from "./rank-table.js";
import { compilePattern, forEachPiece, segment, SpecialMatcher, type Segment } from "./segment.js";
import { SplitCache } from "./split-cache.js";
import { FiberExecutor, type BatchExecutor } from "./batch.js";

const ENDOFTEXT = "<|endoftext|>";

const WHITESPACE_CHAR = /^\p{White_Space}$/u;

/** Result of `encodeWithUnstable`. */
export interface UnstableEncoding {
  /** Tokens that no continuation of the text can change. */
  readonly tokens: Int32Array;
  /** Every token sequence the unstable tail may encode to, once more text follows. */
  readonly completions: Int32Array[];
}

const strictDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const lossyDecoder = new TextDecoder("utf-8", { fatal: false, ignoreBOM: true });

export class Encoding implements Tokenizer {
  readonly name: string;
  readonly params: EncodingParams;
  readonly options: EncodingOptions;
  readonly table: RankTable;
  readonly pattern: RegExp;
  readonly cache: SplitCache;

  private readonly _matcher: SpecialMatcher;
  private readonly _executor: BatchExecutor;

  private constructor(
    params: EncodingParams,
    options: EncodingOptions,
    table: RankTable,
    pattern: RegExp,
  ) {
    this.name = params.name;
    // Keep the validated copies, not the caller's objects.
    this.params = {
      ...params,
      mergeableRanks: table.encoder,
      specialTokens: Object.fromEntries(table.specialEncoder),
    };
    this.options = options;
    this.table = table;
    this.pattern = pattern;
    this.cache = new SplitCache({
      shards: options.splitCacheShards,
      capacity: options.splitCacheCapacity,
    });
    this._matcher = new SpecialMatcher(table.specialEncoder);
    this._executor = new FiberExecutor(this, options.batchConcurrency);
  }

  /**
   * Validate the params and build an encoding.
   *
   * Fails with `ConfigError` on an incomplete or inconsistent table, an
   * invalid pattern, or a vocabulary size that disagrees with
   * `explicitNVocab`.
   */
  static make(
    params: EncodingParams,
    options: Partial<EncodingOptions> = {},
  ): Effect.Effect<Encoding, ConfigError> {
    return Effect.gen(function* () {
      const table = yield* RankTable.make(params.mergeableRanks, params.specialTokens);
      const pattern = yield* compilePattern(params.patStr);

      if (params.explicitNVocab !== undefined) {
        const count = table.ordinaryCount + table.specialCount;
        if (count !== params.explicitNVocab) {
          return yield* Effect.fail(
            new ConfigError({
              message: `${params.name}: expected ${params.explicitNVocab} tokens, found ${count}`,
            }),
          );
        }
        if (table.maxTokenValue !== params.explicitNVocab - 1) {
          return yield* Effect.fail(
            new ConfigError({
              message: `${params.name}: expected max token value ${params.explicitNVocab - 1}, found ${table.maxTokenValue}`,
            }),
          );
        }
      }

      return new Encoding(params, { ...defaultEncodingOptions, ...options }, table, pattern);
    });
  }

  // ── Vocabulary facts ─────────────────────────────────────────────────────

  get maxTokenValue(): Rank {
    return this.table.maxTokenValue;
  }

  /** Largest token value + 1. */
  get nVocab(): number {
    return this.table.maxTokenValue + 1;
  }

  /** Rank of `<|endoftext|>`, when the encoding has it. */
  get eotToken(): Rank | undefined {
    return this.table.specialRankOf(ENDOFTEXT);
  }

  specialTokensSet(): Set<string> {
    return new Set(this.table.specialEncoder.keys());
  }

  tokenByteValues(): Uint8Array[] {
    return this.table.sortedTokenBytes();
  }

  // ── Encoding ─────────────────────────────────────────────────────────────

  /**
   * Encode `text` treating special-token literals as plain text.
   */
  encodeOrdinary(text: string): Int32Array {
    const out: Rank[] = [];
    forEachPiece(text, this.pattern, (piece) => this._encodePiece(piece, out));
    return Int32Array.from(out);
  }

  /**
   * Encode `text`, emitting special tokens for the literals the policy
   * permits. Fails if the text contains a literal the policy forbids.
   * The default policy forbids every special token.
   */
  encode(
    text: string,
    policy: SpecialPolicy = AllowNone,
  ): Effect.Effect<Int32Array, SpecialTokenViolation> {
    return this.segment(text, policy).pipe(
      Effect.map((segments) => {
        const out: Rank[] = [];
        for (const seg of segments) {
          switch (seg._tag) {
            case "Ordinary":
              this._encodePiece(seg.piece, out);
              break;
            case "Special":
              out.push(seg.rank);
              break;
          }
        }
        return Int32Array.from(out);
      }),
    );
  }

  segment(text: string, policy: SpecialPolicy): Effect.Effect<Segment[], SpecialTokenViolation> {
    return segment(text, policy, this._matcher, this.pattern);
  }

  /**
   * Encode `text` for completion: the stable prefix of the encoding, and the
   * candidate encodings of its last ordinary piece, which later text could
   * still merge into. A trailing special token leaves nothing unstable.
   */
  encodeWithUnstable(
    text: string,
    policy: SpecialPolicy = AllowNone,
  ): Effect.Effect<UnstableEncoding, SpecialTokenViolation> {
    return this.segment(text, policy).pipe(
      Effect.map((segments) => {
        const tokens: Rank[] = [];
        let lastPieceLen = 0;
        for (const seg of segments) {
          if (seg._tag === "Special") {
            tokens.push(seg.rank);
            lastPieceLen = 0;
          } else {
            const before = tokens.length;
            this._encodePiece(seg.piece, tokens);
            lastPieceLen = tokens.length - before;
          }
        }
        if (lastPieceLen === 0) return { tokens: Int32Array.from(tokens), completions: [] };

        // Whitespace runs can merge across piece boundaries, so they are all unstable.
        if (this._isAllSpace(tokens[tokens.length - lastPieceLen])) {
          while (lastPieceLen < tokens.length && this._isAllSpace(tokens[tokens.length - lastPieceLen - 1])) {
            lastPieceLen++;
          }
        }
        const unstable = tokens.splice(tokens.length - lastPieceLen).map((t) => this._keyOf(t)).join("");
        return { tokens: Int32Array.from(tokens), completions: this._completions(unstable) };
      }),
    );
  }

  /**
   * Rank of the single token whose bytes are `piece` (UTF-8 for strings).
   * Ordinary tokens are looked up before special-token literals.
   */
  encodeSingleToken(piece: Uint8Array | string): Effect.Effect<Rank, EncodeError> {
    return Effect.suspend(() => {
      const key = typeof piece === "string" ? utf8ByteString(piece) : bytesToByteString(piece);
      const rank = this.table.rankOf(key);
      if (rank !== undefined) return Effect.succeed(rank);

      const literal = typeof piece === "string" ? piece : lossyDecoder.decode(piece);
      const special = this.table.specialRankOf(literal);
      if (special !== undefined && utf8ByteString(literal) === key) return Effect.succeed(special);
      return Effect.fail(
        new EncodeError({ message: `Could not encode ${JSON.stringify([...byteStringToBytes(key)])} to a token` }),
      );
    });
  }

  // ── Decoding ─────────────────────────────────────────────────────────────

  /** Concatenated bytes of `tokens`. Fails on an unknown rank. */
  decodeBytes(tokens: ArrayLike<number>): Effect.Effect<Uint8Array, DecodeError> {
    return Effect.suspend(() => {
      const parts: Uint8Array[] = new Array(tokens.length);
      for (let i = 0; i < tokens.length; i++) {
        const bytes = this.table.bytesOf(tokens[i]);
        if (bytes === undefined) return Effect.fail(unknownToken(tokens[i]));
        parts[i] = bytes;
      }
      return Effect.succeed(concatBytes(parts));
    });
  }

  /**
   * Decode `tokens` to text. `strict` fails on bytes that are not valid
   * UTF-8; `lossy` replaces them with U+FFFD.
   */
  decode(tokens: ArrayLike<number>, mode: DecodeMode = "strict"): Effect.Effect<string, DecodeError> {
    return this.decodeBytes(tokens).pipe(
      Effect.flatMap((bytes) =>
        mode === "lossy"
          ? Effect.succeed(lossyDecoder.decode(bytes))
          : Effect.try({
              try: () => strictDecoder.decode(bytes),
              catch: (cause) =>
                new DecodeError({ message: "Decoded bytes are not valid UTF-8", cause }),
            }),
      ),
    );
  }

  decodeSingleTokenBytes(token: Rank): Effect.Effect<Uint8Array, DecodeError> {
    return Effect.suspend(() => {
      const bytes = this.table.bytesOf(token);
      return bytes === undefined ? Effect.fail(unknownToken(token)) : Effect.succeed(bytes.slice());
    });
  }

  /** Bytes of each token separately. Useful for visualising tokenisation. */
  decodeTokensBytes(tokens: ArrayLike<number>): Effect.Effect<Uint8Array[], DecodeError> {
    return Effect.forEach(Array.from(tokens), (token) => this.decodeSingleTokenBytes(token));
  }

  // ── Batches ──────────────────────────────────────────────────────────────

  encodeBatch(
    texts: readonly string[],
    policy: SpecialPolicy = AllowNone,
    executor: BatchExecutor = this._executor,
  ): Effect.Effect<Int32Array[], SpecialTokenViolation | WorkerError> {
    return executor.encode(texts, policy);
  }

  encodeOrdinaryBatch(
    texts: readonly string[],
    executor: BatchExecutor = this._executor,
  ): Effect.Effect<Int32Array[], WorkerError> {
    return executor.encodeOrdinary(texts);
  }

  decodeBatch(
    batch: readonly ArrayLike<number>[],
    mode: DecodeMode = "strict",
    executor: BatchExecutor = this._executor,
  ): Effect.Effect<string[], DecodeError | WorkerError> {
    return executor.decode(batch, mode);
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  /** Append the ranks of one ordinary piece to `out`. */
  private _encodePiece(piece: string, out: Rank[]): void {
    const bytes: ByteString = utf8ByteString(piece);
    const direct = this.table.rankOf(bytes);
    if (direct !== undefined) {
      out.push(direct);
      return;
    }
    const ranks = this.cache.getOrCompute(piece, () => bytePairMerge(bytes, this.table.encoder));
    for (let i = 0; i < ranks.length; i++) out.push(ranks[i]);
  }

  /** Byte string of an ordinary token. */
  private _keyOf(token: Rank): ByteString {
    const bytes = this.table.isSpecial(token) ? undefined : this.table.bytesOf(token);
    if (bytes === undefined) throw new Error(`No ordinary token ${token}`);
    return bytesToByteString(bytes);
  }

  private _isAllSpace(token: Rank): boolean {
    if (this.table.isSpecial(token)) return false;
    const bytes = this.table.bytesOf(token);
    return bytes !== undefined && bytes.every((b) => b === 0x20 || b === 0x0a || b === 0x09);
  }

  /** Token sequences `unstable` may become once more bytes follow it. */
  private _completions(unstable: ByteString): Int32Array[] {
    const found = new Map<string, Rank[]>();
    const add = (seq: Rank[]): void => {
      const id = seq.join(",");
      if (!found.has(id)) found.set(id, seq);
    };
    const keys = this.table.sortedKeys();

    // Single tokens that start with the unstable bytes.
    for (let i = lowerBound(keys, unstable); i < keys.length && keys[i].startsWith(unstable); i++) {
      add([this._rankOfKey(keys[i])]);
    }

    // A token straddling each later position: the bytes before it plus any token
    // that starts with the bytes after it, re-encoded and cut once it covers
    // the unstable bytes.
    for (let split = 1; split < unstable.length; split++) {
      const prefix = unstable.slice(0, split);
      const suffix = unstable.slice(split);
      for (let i = lowerBound(keys, suffix); i < keys.length && keys[i].startsWith(suffix); i++) {
        const possibility = prefix + keys[i];
        const text = strictUtf8(possibility);
        const encoded = text === undefined ? bytePairMerge(possibility, this.table.encoder) : this.encodeOrdinary(text);
        const seq: Rank[] = [];
        let covered = 0;
        for (const token of encoded) {
          seq.push(token);
          covered += this._keyOf(token).length;
          if (covered >= unstable.length) break;
        }
        add(seq);
      }
    }

    // Trailing whitespace may split off from the rest on its own.
    if (unstable.length > 1) {
      const last = lastChar(unstable);
      if (last !== undefined && last.size < unstable.length && WHITESPACE_CHAR.test(last.char)) {
        const cut = unstable.length - last.size;
        add([
          ...bytePairMerge(unstable.slice(0, cut), this.table.encoder),
          ...bytePairMerge(unstable.slice(cut), this.table.encoder),
        ]);
      }
    }

    return [...found.values()].map((seq) => Int32Array.from(seq));
  }

  private _rankOfKey(key: ByteString): Rank {
    const rank = this.table.rankOf(key);
    if (rank === undefined) throw new Error(`No rank for a key of ${key.length} byte(s)`);
    return rank;
  }

  toString(): string {
    return `<Encoding '${this.name}'>`;
  }
}

/** First index of `sorted` whose key is not below `key`. */
function lowerBound(sorted: readonly ByteString[], key: ByteString): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < key) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** The text of `key` if it is valid UTF-8. */
function strictUtf8(key: ByteString): string | undefined {
  // Invalid sequences come back as U+FFFD and no longer re-encode to `key`.
  const text = lossyDecoder.decode(byteStringToBytes(key));
  return utf8ByteString(text) === key ? text : undefined;
}

/** Last character of `key` and its length in bytes, if the tail is valid UTF-8. */
function lastChar(key: ByteString): { readonly char: string; readonly size: number } | undefined {
  for (let size = 1; size <= Math.min(4, key.length); size++) {
    const lead = key.charCodeAt(key.length - size);
    if (lead >= 0x80 && lead < 0xc0) continue;
    const text = strictUtf8(key.slice(key.length - size));
    return text !== undefined && [...text].length === 1 ? { char: text, size } : undefined;
  }
  return undefined;
}

function unknownToken(token: number): DecodeError {
  return new DecodeError({ message: `Token ${token} not found`, token });
}
