/**
 * Named encodings and the process-wide encoding registry.
 */
import { Effect } from "effect";
import {
  defaultConfig,
  Registry,
  type ConfigError,
  type EncodingParams,
  type LoadError,
  type RanktokConfig,
  type RegistryError,
} from "@ranktok/core";
import { Encoding } from "./encoding.js";
import { loadDataGymRanks, loadTiktokenBpe } from "./load.js";

export const ENDOFTEXT = "<|endoftext|>";
export const FIM_PREFIX = "<|fim_prefix|>";
export const FIM_MIDDLE = "<|fim_middle|>";
export const FIM_SUFFIX = "<|fim_suffix|>";
export const ENDOFPROMPT = "<|endofprompt|>";

const BLOB_ROOT = "https://openaipublic.blob.core.windows.net";

export const R50K_PATTERN = String.raw`'s|'t|'re|'ve|'m|'ll|'d| ?\p{L}+| ?\p{N}+| ?[^\s\p{L}\p{N}]+|\s+(?!\S)|\s+`;

export const CL100K_PATTERN = String.raw`'(?:[sS]|[tT]|[rR][eE]|[vV][eE]|[mM]|[lL][lL]|[dD])|[^\r\n\p{L}\p{N}]?\p{L}+|\p{N}{1,3}| ?[^\s\p{L}\p{N}]+[\r\n]*|\s*[\r\n]+|\s+(?!\S)|\s+`;

type ParamsLoader = (cacheDir: string | null) => Effect.Effect<EncodingParams, LoadError>;

export const gpt2: ParamsLoader = (cacheDir) =>
  loadDataGymRanks(
    `${BLOB_ROOT}/gpt-2/encodings/main/vocab.bpe`,
    `${BLOB_ROOT}/gpt-2/encodings/main/encoder.json`,
    cacheDir,
  ).pipe(
    Effect.map((mergeableRanks) => ({
      name: "gpt2",
      patStr: R50K_PATTERN,
      mergeableRanks,
      specialTokens: { [ENDOFTEXT]: 50256 },
      explicitNVocab: 50257,
    })),
  );

export const r50kBase: ParamsLoader = (cacheDir) =>
  loadTiktokenBpe(`${BLOB_ROOT}/encodings/r50k_base.tiktoken`, cacheDir).pipe(
    Effect.map((mergeableRanks) => ({
      name: "r50k_base",
      patStr: R50K_PATTERN,
      mergeableRanks,
      specialTokens: { [ENDOFTEXT]: 50256 },
      explicitNVocab: 50257,
    })),
  );

export const p50kBase: ParamsLoader = (cacheDir) =>
  loadTiktokenBpe(`${BLOB_ROOT}/encodings/p50k_base.tiktoken`, cacheDir).pipe(
    Effect.map((mergeableRanks) => ({
      name: "p50k_base",
      patStr: R50K_PATTERN,
      mergeableRanks,
      specialTokens: { [ENDOFTEXT]: 50256 },
      explicitNVocab: 50281,
    })),
  );

export const p50kEdit: ParamsLoader = (cacheDir) =>
  loadTiktokenBpe(`${BLOB_ROOT}/encodings/p50k_base.tiktoken`, cacheDir).pipe(
    Effect.map((mergeableRanks) => ({
      name: "p50k_edit",
      patStr: R50K_PATTERN,
      mergeableRanks,
      specialTokens: {
        [ENDOFTEXT]: 50256,
        [FIM_PREFIX]: 50281,
        [FIM_MIDDLE]: 50282,
        [FIM_SUFFIX]: 50283,
      },
    })),
  );

export const cl100kBase: ParamsLoader = (cacheDir) =>
  loadTiktokenBpe(`${BLOB_ROOT}/encodings/cl100k_base.tiktoken`, cacheDir).pipe(
    Effect.map((mergeableRanks) => ({
      name: "cl100k_base",
      patStr: CL100K_PATTERN,
      mergeableRanks,
      specialTokens: {
        [ENDOFTEXT]: 100257,
        [FIM_PREFIX]: 100258,
        [FIM_MIDDLE]: 100259,
        [FIM_SUFFIX]: 100260,
        [ENDOFPROMPT]: 100276,
      },
    })),
  );

export const ENCODING_CONSTRUCTORS: Readonly<Record<string, ParamsLoader>> = {
  gpt2,
  r50k_base: r50kBase,
  p50k_base: p50kBase,
  p50k_edit: p50kEdit,
  cl100k_base: cl100kBase,
};

// ── Registry ──────────────────────────────────────────────────────────────

export type EncodingRegistry = Registry<Encoding, LoadError | ConfigError>;

/**
 * Registry of every named encoding, loaded with `config`'s cache directory
 * and split-cache settings on first use.
 */
export function makeEncodingRegistry(config: RanktokConfig = defaultConfig): EncodingRegistry {
  const registry = new Registry<Encoding, LoadError | ConfigError>("encoding");
  for (const [name, load] of Object.entries(ENCODING_CONSTRUCTORS)) {
    registry.register(
      name,
      load(config.cacheDir).pipe(
        Effect.flatMap((params) =>
          Encoding.make(params, {
            splitCacheShards: config.splitCacheShards,
            splitCacheCapacity: config.splitCacheCapacity,
            batchConcurrency: config.batchConcurrency,
          }),
        ),
        Effect.tap((encoding) => Effect.logInfo(`loaded encoding ${encoding.name} (${encoding.nVocab} tokens)`)),
        Effect.withSpan(`encoding.load.${name}`),
      ),
    );
  }
  return registry;
}

/**
 * Global encoding registry.
 *
 * Each encoding is downloaded (or read from the cache) and built once per
 * process, with the default configuration.
 *
 * Usage:
 * ```ts
 * const enc = yield* getEncoding("cl100k_base");
 * ```
 */
export const encodingRegistry: EncodingRegistry = makeEncodingRegistry();

export function getEncoding(name: string): Effect.Effect<Encoding, LoadError | ConfigError | RegistryError> {
  return encodingRegistry.get(name);
}

export function listEncodingNames(): string[] {
  return encodingRegistry.list();
}
