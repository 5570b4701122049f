/**
 * Vocabulary loading: the `.tiktoken` rank-file format, the GPT-2 "data gym"
 * merge format, and a download cache keyed by the SHA-256 of the source path.
 */
import { createHash, randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Effect, Option } from "effect";
import { LoadError, type ByteString, type Rank } from "@ranktok/core";
import { bytesToByteString, byteStringToBytes } from "./bytes.js";

// ── .tiktoken files ────────────────────────────────────────────────────────

/** Parse `<base64 bytes> <rank>` lines. Blank lines are skipped. */
export function parseTiktokenBpe(contents: string): Effect.Effect<Map<ByteString, Rank>, LoadError> {
  return Effect.suspend(() => {
    const ranks = new Map<ByteString, Rank>();
    const lines = contents.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (line === "") continue;
      const m = /^([A-Za-z0-9+/]+={0,2}) (\d+)$/.exec(line);
      if (m === null) {
        return Effect.fail(new LoadError({ message: `Malformed rank file line ${i + 1}: "${line}"` }));
      }
      ranks.set(bytesToByteString(Buffer.from(m[1], "base64")), parseInt(m[2], 10));
    }
    return Effect.succeed(ranks);
  });
}

/** Inverse of `parseTiktokenBpe`, one line per token in rank order. */
export function dumpTiktokenBpe(ranks: ReadonlyMap<ByteString, Rank>): string {
  const entries = [...ranks].sort((a, b) => a[1] - b[1]);
  let out = "";
  for (const [key, rank] of entries) {
    out += `${Buffer.from(byteStringToBytes(key)).toString("base64")} ${rank}\n`;
  }
  return out;
}

// ── Data gym ───────────────────────────────────────────────────────────────

/**
 * GPT-2 stores bytes as printable characters: printable Latin-1 bytes other
 * than space stand for themselves, every other byte maps to `256 + n` in
 * ascending byte order. Single-byte ranks follow the same order.
 */
const DATA_GYM_BYTES: readonly number[] = (() => {
  const order: number[] = [];
  for (let b = 0x21; b <= 0x7e; b++) order.push(b);
  for (let b = 0xa1; b < 0xad; b++) order.push(b);
  for (let b = 0xae; b <= 0xff; b++) order.push(b);
  const printable = new Set(order);
  for (let b = 0; b <= 0xff; b++) if (!printable.has(b)) order.push(b);
  return order;
})();

const DATA_GYM_CHAR_TO_BYTE: ReadonlyMap<number, number> = (() => {
  const map = new Map<number, number>();
  let n = 0;
  for (const b of DATA_GYM_BYTES) {
    if (map.size < 188) map.set(b, b);
    else map.set(256 + n++, b);
  }
  return map;
})();

function decodeDataGym(value: string): ByteString | undefined {
  let out = "";
  for (const ch of value) {
    const code = ch.codePointAt(0);
    const byte = code === undefined ? undefined : DATA_GYM_CHAR_TO_BYTE.get(code);
    if (byte === undefined) return undefined;
    out += String.fromCharCode(byte);
  }
  return out;
}

const IGNORED_ENCODER_ENTRIES = ["<|endoftext|>", "<|startoftext|>"];

/**
 * Ranks from a data-gym `vocab.bpe` (merges, after a version header line)
 * checked against its `encoder.json`.
 */
export function dataGymToMergeableBpeRanks(
  vocabBpe: string,
  encoderJson: string,
): Effect.Effect<Map<ByteString, Rank>, LoadError> {
  return Effect.gen(function* () {
    const ranks = new Map<ByteString, Rank>();
    DATA_GYM_BYTES.forEach((b, i) => ranks.set(String.fromCharCode(b), i));

    let next = ranks.size;
    const lines = vocabBpe.split("\n");
    for (let i = 1; i < lines.length; i++) {
      const line = lines[i].trimEnd();
      const space = line.indexOf(" ");
      if (space === -1) continue;
      const first = decodeDataGym(line.slice(0, space));
      const second = decodeDataGym(line.slice(space + 1));
      if (first === undefined || second === undefined) {
        return yield* Effect.fail(new LoadError({ message: `vocab.bpe line ${i + 1} has characters outside the data gym alphabet` }));
      }
      ranks.set(first + second, next++);
    }

    const parsed: unknown = yield* Effect.try({
      try: () => JSON.parse(encoderJson),
      catch: (cause) => new LoadError({ message: "encoder.json is not valid JSON", cause }),
    });
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return yield* Effect.fail(new LoadError({ message: "encoder.json must be a JSON object" }));
    }

    const entries = Object.entries(parsed).filter(([key]) => !IGNORED_ENCODER_ENTRIES.includes(key));
    const mismatch = entries.length !== ranks.size ||
      entries.some(([key, rank]) => {
        const bytes = decodeDataGym(key);
        return bytes === undefined || ranks.get(bytes) !== rank;
      });
    if (mismatch) {
      return yield* Effect.fail(new LoadError({ message: "encoder.json does not agree with the merges in vocab.bpe" }));
    }
    return ranks;
  });
}

// ── Cached reads ───────────────────────────────────────────────────────────

/** Cache file name for `blobPath`: uppercase hex SHA-256. */
export function cacheFilename(blobPath: string): string {
  return createHash("sha256").update(blobPath).digest("hex").toUpperCase();
}

function isRemote(blobPath: string): boolean {
  return blobPath.startsWith("http://") || blobPath.startsWith("https://");
}

function readSource(blobPath: string): Effect.Effect<string, LoadError> {
  if (!isRemote(blobPath)) {
    return Effect.tryPromise({
      try: () => readFile(blobPath, "utf-8"),
      catch: (cause) => new LoadError({ message: `Failed to read ${blobPath}`, cause }),
    });
  }
  return Effect.logDebug(`downloading ${blobPath}`).pipe(
    Effect.zipRight(
      Effect.tryPromise({
        try: async () => {
          const res = await fetch(blobPath);
          if (!res.ok) throw new Error(`HTTP ${res.status} ${res.statusText}`);
          return res.text();
        },
        catch: (cause) =>
          new LoadError({
            message: `Failed to download ${blobPath}: ${cause instanceof Error ? cause.message : String(cause)}`,
            cause,
          }),
      }),
    ),
  );
}

/**
 * Contents of `blobPath` (a URL or a local path). Downloads are kept in
 * `cacheDir`, written to a temporary file and renamed into place so a
 * concurrent reader never sees a partial file. `null` disables the cache.
 */
export function readFileCached(blobPath: string, cacheDir: string | null): Effect.Effect<string, LoadError> {
  if (cacheDir === null || !isRemote(blobPath)) return readSource(blobPath);

  const name = cacheFilename(blobPath);
  const cachePath = join(cacheDir, name);
  return Effect.gen(function* () {
    const cached = yield* Effect.option(Effect.tryPromise(() => readFile(cachePath, "utf-8")));
    if (Option.isSome(cached)) {
      yield* Effect.logDebug(`cache hit for ${blobPath}`);
      return cached.value;
    }

    const contents = yield* readSource(blobPath);
    yield* Effect.tryPromise({
      try: async () => {
        await mkdir(cacheDir, { recursive: true });
        const tmp = join(cacheDir, `${name}.${randomUUID()}.tmp`);
        await writeFile(tmp, contents, "utf-8");
        await rename(tmp, cachePath);
      },
      catch: (cause) => new LoadError({ message: `Failed to write cache file ${cachePath}`, cause }),
    });
    return contents;
  });
}

export function loadTiktokenBpe(
  blobPath: string,
  cacheDir: string | null,
): Effect.Effect<Map<ByteString, Rank>, LoadError> {
  return readFileCached(blobPath, cacheDir).pipe(Effect.flatMap(parseTiktokenBpe));
}

export function loadDataGymRanks(
  vocabBpePath: string,
  encoderJsonPath: string,
  cacheDir: string | null,
): Effect.Effect<Map<ByteString, Rank>, LoadError> {
  return Effect.all([readFileCached(vocabBpePath, cacheDir), readFileCached(encoderJsonPath, cacheDir)], {
    concurrency: 2,
  }).pipe(Effect.flatMap(([vocab, encoder]) => dataGymToMergeableBpeRanks(vocab, encoder)));
}
