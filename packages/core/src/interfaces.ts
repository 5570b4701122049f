/**
 * Subsystem interfaces (ports).
 */
import { Context, Effect } from "effect";
import type { DecodeError, SpecialTokenViolation } from "./errors.js";
import type { DecodeMode, SpecialPolicy } from "./types.js";

// ── Tokenizer ──────────────────────────────────────────────────────────────
export interface Tokenizer {
  readonly name: string;
  /** Largest token value + 1. */
  readonly nVocab: number;
  encodeOrdinary(text: string): Int32Array;
  encode(text: string, policy?: SpecialPolicy): Effect.Effect<Int32Array, SpecialTokenViolation>;
  decode(tokens: ArrayLike<number>, mode?: DecodeMode): Effect.Effect<string, DecodeError>;
}

export class TokenizerService extends Context.Tag("TokenizerService")<
  TokenizerService,
  Tokenizer
>() {}
