/**
 * Toy vocabularies for the test suites.
 *
 * Single bytes get their own value as rank; merges are numbered from 256 in
 * the order given.
 */
import { Effect } from "effect";
import type { ByteString, EncodingParams, Rank } from "@ranktok/core";
import { Encoding, R50K_PATTERN } from "@ranktok/tokenizers";

export function byteRanks(merges: readonly ByteString[] = []): Map<ByteString, Rank> {
  const ranks = new Map<ByteString, Rank>();
  for (let b = 0; b < 256; b++) ranks.set(String.fromCharCode(b), b);
  merges.forEach((merge, i) => ranks.set(merge, 256 + i));
  return ranks;
}

export function toyParams(
  merges: readonly ByteString[] = [],
  specialTokens: Readonly<Record<string, Rank>> = {},
  patStr: string = R50K_PATTERN,
): EncodingParams {
  return { name: "toy", patStr, mergeableRanks: byteRanks(merges), specialTokens };
}

export function toyEncoding(
  merges: readonly ByteString[] = [],
  specialTokens: Readonly<Record<string, Rank>> = {},
  patStr: string = R50K_PATTERN,
): Encoding {
  return Effect.runSync(Encoding.make(toyParams(merges, specialTokens, patStr)));
}

export const EOT = "<|endoftext|>";
export const FIM = "<|fim|>";
