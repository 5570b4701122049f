/**
 * Runtime configuration: defaults, an optional JSON file, then environment
 * variables, in increasing order of precedence.
 */
import { readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { ConfigError } from "./errors.js";

export type BatchExecutorKind = "fiber" | "thread";

export interface RanktokConfig {
  /** Where downloaded vocabulary files are kept. `null` disables the cache. */
  readonly cacheDir: string | null;
  readonly splitCacheShards: number;
  /** Entries per shard. */
  readonly splitCacheCapacity: number;
  readonly batchConcurrency: number;
  readonly batchExecutor: BatchExecutorKind;
  readonly logLevel: string;
}

export const defaultConfig: RanktokConfig = {
  cacheDir: join(tmpdir(), "ranktok-cache"),
  splitCacheShards: 16,
  splitCacheCapacity: 4096,
  batchConcurrency: 4,
  batchExecutor: "fiber",
  logLevel: "info",
};

type Env = Readonly<Record<string, string | undefined>>;

/** Overrides read from `RANKTOK_*` variables. Throws on an unknown executor. */
export function configFromEnv(env: Env = process.env): Partial<RanktokConfig> {
  const out: { -readonly [K in keyof RanktokConfig]?: RanktokConfig[K] } = {};

  const cacheDir = env["RANKTOK_CACHE_DIR"];
  if (cacheDir !== undefined) out.cacheDir = cacheDir === "" ? null : cacheDir;

  const logLevel = env["RANKTOK_LOG_LEVEL"];
  if (logLevel) out.logLevel = logLevel;

  const concurrency = env["RANKTOK_BATCH_CONCURRENCY"];
  if (concurrency) out.batchConcurrency = parseInt(concurrency, 10);

  const executor = env["RANKTOK_BATCH_EXECUTOR"];
  if (executor === "fiber" || executor === "thread") {
    out.batchExecutor = executor;
  } else if (executor) {
    throw new Error(`RANKTOK_BATCH_EXECUTOR must be "fiber" or "thread", got "${executor}"`);
  }

  return out;
}

/** Validate a RanktokConfig, throwing on invalid values. */
export function validateConfig(config: RanktokConfig): void {
  if (config.cacheDir !== null && typeof config.cacheDir !== "string") {
    throw new Error(`cacheDir must be a string or null`);
  }
  if (typeof config.logLevel !== "string") {
    throw new Error(`logLevel must be a string`);
  }
  if (!Number.isInteger(config.splitCacheShards) || config.splitCacheShards < 1) {
    throw new Error(`splitCacheShards must be an integer >= 1, got ${config.splitCacheShards}`);
  }
  if (!Number.isInteger(config.splitCacheCapacity) || config.splitCacheCapacity < 1) {
    throw new Error(`splitCacheCapacity must be an integer >= 1, got ${config.splitCacheCapacity}`);
  }
  if (!Number.isInteger(config.batchConcurrency) || config.batchConcurrency < 1) {
    throw new Error(`batchConcurrency must be an integer >= 1, got ${config.batchConcurrency}`);
  }
  if (config.batchExecutor !== "fiber" && config.batchExecutor !== "thread") {
    throw new Error(`batchExecutor must be "fiber" or "thread", got "${String(config.batchExecutor)}"`);
  }
}

/** Merge and validate configuration sources. */
export function resolveConfig(
  file: Readonly<Record<string, unknown>> = {},
  env: Env = process.env,
): Effect.Effect<RanktokConfig, ConfigError> {
  return Effect.try({
    try: () => {
      const config: RanktokConfig = { ...defaultConfig, ...pickKnown(file), ...configFromEnv(env) };
      validateConfig(config);
      return config;
    },
    catch: (cause) =>
      new ConfigError({ message: cause instanceof Error ? cause.message : String(cause), cause }),
  });
}

/** Load configuration from an optional JSON file plus the environment. */
export function loadConfig(
  path?: string,
  env: Env = process.env,
): Effect.Effect<RanktokConfig, ConfigError> {
  if (!path) return resolveConfig({}, env);

  return Effect.tryPromise({
    try: async () => {
      const raw = await readFile(path, "utf-8");
      const parsed: unknown = JSON.parse(raw);
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error("expected a JSON object");
      }
      return Object.fromEntries(Object.entries(parsed));
    },
    catch: (cause) =>
      new ConfigError({
        message: `Failed to read config at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
        cause,
      }),
  }).pipe(Effect.flatMap((file) => resolveConfig(file, env)));
}

const knownKeys = new Set<string>(Object.keys(defaultConfig));

function pickKnown(file: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(file)) {
    if (knownKeys.has(key)) out[key] = value;
  }
  return out;
}
