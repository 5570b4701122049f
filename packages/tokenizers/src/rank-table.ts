/**
 * Immutable bidirectional rank tables.
 *
 * Holds the ordinary encoder (byte string -> rank), its exact inverse, and the
 * special-token table with its own inverse. Construction validates the
 * invariants the merge engine and decoder rely on; a table that passes
 * `make` never changes afterwards.
 */
import { Effect } from "effect";
import { ConfigError, type ByteString, type Rank } from "@ranktok/core";
import { byteStringToBytes, isByteString } from "./bytes.js";

const textEncoder = new TextEncoder();

/** Largest rank that fits the `Int32Array`s encode returns. */
export const MAX_RANK = 0x7fffffff;

export class RankTable {
  /** byte string -> rank */
  readonly encoder: ReadonlyMap<ByteString, Rank>;

  /** literal -> rank */
  readonly specialEncoder: ReadonlyMap<string, Rank>;

  /** rank -> bytes, ordinary range */
  private readonly _decoder: Map<Rank, Uint8Array>;

  /** rank -> UTF-8 bytes of the literal, special range */
  private readonly _specialDecoder: Map<Rank, Uint8Array>;

  /** Largest ordinary or special rank. */
  readonly maxTokenValue: Rank;

  private _sortedKeys: ByteString[] | undefined;

  private constructor(
    encoder: ReadonlyMap<ByteString, Rank>,
    decoder: Map<Rank, Uint8Array>,
    specialEncoder: ReadonlyMap<string, Rank>,
    specialDecoder: Map<Rank, Uint8Array>,
    maxTokenValue: Rank,
  ) {
    this.encoder = encoder;
    this._decoder = decoder;
    this.specialEncoder = specialEncoder;
    this._specialDecoder = specialDecoder;
    this.maxTokenValue = maxTokenValue;
  }

  /**
   * Validate and build the tables.
   *
   * Fails with `ConfigError` when a single byte is missing, a rank is not an
   * integer in `[0, MAX_RANK]`, two entries share a rank, a special literal
   * is empty, or a special rank collides with an ordinary one.
   */
  static make(
    mergeableRanks: ReadonlyMap<ByteString, Rank>,
    specialTokens: Readonly<Record<string, Rank>>,
  ): Effect.Effect<RankTable, ConfigError> {
    return Effect.suspend(() => {
      // Private copy: later changes to the caller's map must not reach the tables.
      const encoder = new Map(mergeableRanks);
      for (let b = 0; b < 256; b++) {
        if (!encoder.has(String.fromCharCode(b))) {
          return Effect.fail(
            new ConfigError({
              message: `Encoder table has no entry for the single byte 0x${b.toString(16).padStart(2, "0")}`,
            }),
          );
        }
      }

      let maxTokenValue = 0;
      const decoder = new Map<Rank, Uint8Array>();
      for (const [key, rank] of encoder) {
        if (!Number.isSafeInteger(rank) || rank < 0 || rank > MAX_RANK) {
          return Effect.fail(new ConfigError({ message: `Invalid rank ${rank} in encoder table` }));
        }
        if (key.length === 0) {
          return Effect.fail(new ConfigError({ message: "Encoder table contains an empty byte sequence" }));
        }
        if (!isByteString(key)) {
          return Effect.fail(
            new ConfigError({ message: `Encoder key for rank ${rank} is not a byte string` }),
          );
        }
        if (decoder.has(rank)) {
          return Effect.fail(
            new ConfigError({ message: `Rank ${rank} is assigned to more than one byte sequence` }),
          );
        }
        decoder.set(rank, byteStringToBytes(key));
        if (rank > maxTokenValue) maxTokenValue = rank;
      }

      const specialEncoder = new Map<string, Rank>();
      const specialDecoder = new Map<Rank, Uint8Array>();
      for (const [literal, rank] of Object.entries(specialTokens)) {
        if (literal.length === 0) {
          return Effect.fail(new ConfigError({ message: "Special token literal must not be empty" }));
        }
        if (!Number.isSafeInteger(rank) || rank < 0 || rank > MAX_RANK) {
          return Effect.fail(
            new ConfigError({ message: `Invalid rank ${rank} for special token "${literal}"` }),
          );
        }
        if (decoder.has(rank)) {
          return Effect.fail(
            new ConfigError({
              message: `Special token "${literal}" has rank ${rank}, which is also an ordinary rank`,
            }),
          );
        }
        if (specialDecoder.has(rank)) {
          return Effect.fail(
            new ConfigError({ message: `Rank ${rank} is assigned to more than one special token` }),
          );
        }
        specialEncoder.set(literal, rank);
        specialDecoder.set(rank, textEncoder.encode(literal));
        if (rank > maxTokenValue) maxTokenValue = rank;
      }

      return Effect.succeed(
        new RankTable(encoder, decoder, specialEncoder, specialDecoder, maxTokenValue),
      );
    });
  }

  // ── Lookups ──────────────────────────────────────────────────────────────

  rankOf(bytes: ByteString): Rank | undefined {
    return this.encoder.get(bytes);
  }

  specialRankOf(literal: string): Rank | undefined {
    return this.specialEncoder.get(literal);
  }

  /** Bytes of an ordinary or special rank. */
  bytesOf(rank: Rank): Uint8Array | undefined {
    return this._decoder.get(rank) ?? this._specialDecoder.get(rank);
  }

  isSpecial(rank: Rank): boolean {
    return this._specialDecoder.has(rank);
  }

  get ordinaryCount(): number {
    return this._decoder.size;
  }

  get specialCount(): number {
    return this._specialDecoder.size;
  }

  /** Every ordinary token as a byte string, sorted bytewise. Built on first use. */
  sortedKeys(): readonly ByteString[] {
    // Code-unit order of byte strings is bytewise lexicographic order.
    this._sortedKeys ??= [...this.encoder.keys()].sort();
    return this._sortedKeys;
  }

  /** Every ordinary token's bytes, sorted bytewise. */
  sortedTokenBytes(): Uint8Array[] {
    return this.sortedKeys().map(byteStringToBytes);
  }
}
