/**
 * Persistence helpers for rank tables.
 *
 * Saves and loads mergeable ranks as `.tiktoken` files using
 * node:fs/promises, with every I/O operation wrapped in `Effect.tryPromise`
 * so callers get typed `LoadError` failures instead of raw exceptions.
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { LoadError, type ByteString, type Rank } from "@ranktok/core";
import { dumpTiktokenBpe, parseTiktokenBpe } from "./load.js";

/**
 * Write `ranks` to `path` in rank order.
 *
 * Creates parent directories if they don't already exist.
 */
export function saveRanks(
  path: string,
  ranks: ReadonlyMap<ByteString, Rank>,
): Effect.Effect<void, LoadError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, dumpTiktokenBpe(ranks), "utf-8");
    },
    catch: (cause) =>
      new LoadError({
        message: `Failed to save ranks to "${path}"`,
        cause,
      }),
  });
}

/** Load ranks from a `.tiktoken` file. */
export function loadRanks(path: string): Effect.Effect<Map<ByteString, Rank>, LoadError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) =>
      new LoadError({
        message: `Failed to load ranks from "${path}"`,
        cause,
      }),
  }).pipe(Effect.flatMap(parseTiktokenBpe));
}
