/**
 * Effect layers for dependency injection.
 *
 * Each service gets a Layer that constructs it from config.
 */
import { Context, Layer } from "effect";
import { TokenizerService, type RanktokConfig, type Tokenizer } from "@ranktok/core";
import { makeEncodingRegistry, makeExecutor, type BatchExecutor, type Encoding } from "@ranktok/tokenizers";

// ── Tokenizer Layer ────────────────────────────────────────────────────────

export const TokenizerFrom = (tokenizer: Tokenizer) =>
  Layer.succeed(TokenizerService, tokenizer);

/** Load the named encoding with `config`'s cache and split-cache settings. */
export const EncodingLive = (name: string, config: RanktokConfig) =>
  Layer.effect(TokenizerService, makeEncodingRegistry(config).get(name));

// ── Batch Layer ────────────────────────────────────────────────────────────

export class BatchService extends Context.Tag("BatchService")<BatchService, BatchExecutor>() {}

/**
 * Executor of `config.batchExecutor` kind for `encoding`. A thread pool is
 * shut down when the layer's scope closes.
 */
export const BatchLive = (encoding: Encoding, config: RanktokConfig) =>
  Layer.scoped(BatchService, makeExecutor(encoding, config.batchExecutor, config.batchConcurrency));
