/**
 * Resolve encodings and input text from CLI args.
 */
import { basename, extname } from "node:path";
import { readFile } from "node:fs/promises";
import { text } from "node:stream/consumers";
import { Data, Effect } from "effect";
import type { ConfigError, LoadError, RanktokConfig, RegistryError } from "@ranktok/core";
import {
  CL100K_PATTERN,
  Encoding,
  encodingForModel,
  loadRanks,
  makeEncodingRegistry,
} from "@ranktok/tokenizers";
import { parseTokens, strArg } from "./parse.js";

export class UsageError extends Data.TaggedError("UsageError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export const DEFAULT_ENCODING = "cl100k_base";

/**
 * `--ranks=file.tiktoken` (with an optional `--pattern`), `--model=name`
 * or `--encoding=name`, in that order of preference.
 */
export function resolveEncoding(
  kv: Record<string, string>,
  config: RanktokConfig,
): Effect.Effect<Encoding, LoadError | ConfigError | RegistryError> {
  const options = {
    splitCacheShards: config.splitCacheShards,
    splitCacheCapacity: config.splitCacheCapacity,
    batchConcurrency: config.batchConcurrency,
  };
  const ranksPath = kv["ranks"];
  if (ranksPath) {
    return loadRanks(ranksPath).pipe(
      Effect.flatMap((mergeableRanks) =>
        Encoding.make(
          {
            name: basename(ranksPath, extname(ranksPath)),
            patStr: strArg(kv, "pattern", CL100K_PATTERN),
            mergeableRanks,
            specialTokens: {},
          },
          options,
        ),
      ),
    );
  }
  const registry = makeEncodingRegistry(config);
  const model = kv["model"];
  if (model) return encodingForModel(model, registry);
  return registry.get(strArg(kv, "encoding", DEFAULT_ENCODING));
}

/** `--text=...`, else the contents of `--file=path`, else stdin. */
export function readInput(kv: Record<string, string>): Effect.Effect<string, UsageError> {
  const inline = kv["text"];
  if (inline !== undefined) return Effect.succeed(inline);
  const path = kv["file"];
  return Effect.tryPromise({
    try: () => (path ? readFile(path, "utf-8") : text(process.stdin)),
    catch: (cause) => new UsageError({ message: `Failed to read ${path ?? "stdin"}`, cause }),
  });
}

/** `--tokens=...`, else token ids read like `readInput`. */
export function readTokens(kv: Record<string, string>): Effect.Effect<number[], UsageError> {
  const inline = kv["tokens"];
  return (inline !== undefined ? Effect.succeed(inline) : readInput(kv)).pipe(
    Effect.flatMap((raw) =>
      Effect.try({
        try: () => parseTokens(raw),
        catch: (cause) => new UsageError({ message: cause instanceof Error ? cause.message : String(cause), cause }),
      }),
    ),
  );
}

/** Lines of `input`, without the empty string after a final newline. */
export function splitLines(input: string): string[] {
  const lines = input.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}
