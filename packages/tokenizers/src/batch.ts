/**
 * Batch driver.
 *
 * Applies encode or decode to many inputs at once. Output order always
 * matches input order, and the whole batch fails with the error of the
 * lowest-indexed failing item. Two executors share one interface: fibers in the calling
 * thread, and a pool of worker threads that each hold their own encoding.
 */
import { Effect, Either } from "effect";
import {
  WorkerError,
  type DecodeError,
  type DecodeMode,
  type SpecialPolicy,
  type SpecialTokenViolation,
} from "@ranktok/core";
import type { BatchFailure, BatchRequest, BatchResult } from "./batch-protocol.js";
import type { Encoding } from "./encoding.js";

export interface BatchExecutor {
  /** Items (fibers) or chunks (threads) in flight at once. */
  readonly concurrency: number;
  encode(
    texts: readonly string[],
    policy: SpecialPolicy,
  ): Effect.Effect<Int32Array[], SpecialTokenViolation | WorkerError>;
  encodeOrdinary(texts: readonly string[]): Effect.Effect<Int32Array[], WorkerError>;
  decode(
    batch: readonly ArrayLike<number>[],
    mode: DecodeMode,
  ): Effect.Effect<string[], DecodeError | WorkerError>;
}

/**
 * `Effect.forEach` that reports the failure of the lowest failing index,
 * whichever item happened to fail first in time.
 */
export function forEachInOrder<A, B, E>(
  items: Iterable<A>,
  f: (item: A, index: number) => Effect.Effect<B, E>,
  concurrency: number | "unbounded",
): Effect.Effect<B[], E> {
  return Effect.forEach(items, (item, index) => Effect.either(f(item, index)), { concurrency }).pipe(
    Effect.flatMap((results) => {
      const out: B[] = [];
      for (const result of results) {
        if (Either.isLeft(result)) return Effect.fail(result.left);
        out.push(result.right);
      }
      return Effect.succeed(out);
    }),
  );
}

// ── Fibers ─────────────────────────────────────────────────────────────────

/**
 * Runs items as fibers sharing one encoding (and its split cache). Items
 * yield between each other, so a large batch does not starve other fibers.
 */
export class FiberExecutor implements BatchExecutor {
  readonly concurrency: number;

  constructor(
    private readonly encoding: Encoding,
    concurrency: number,
  ) {
    this.concurrency = Math.max(1, concurrency);
  }

  encode(texts: readonly string[], policy: SpecialPolicy): Effect.Effect<Int32Array[], SpecialTokenViolation> {
    return forEachInOrder(
      texts,
      (text) => Effect.zipRight(Effect.yieldNow(), this.encoding.encode(text, policy)),
      this.concurrency,
    );
  }

  encodeOrdinary(texts: readonly string[]): Effect.Effect<Int32Array[]> {
    return forEachInOrder(
      texts,
      (text) => Effect.zipRight(Effect.yieldNow(), Effect.sync(() => this.encoding.encodeOrdinary(text))),
      this.concurrency,
    );
  }

  decode(batch: readonly ArrayLike<number>[], mode: DecodeMode): Effect.Effect<string[], DecodeError> {
    return forEachInOrder(
      batch,
      (tokens) => Effect.zipRight(Effect.yieldNow(), this.encoding.decode(tokens, mode)),
      this.concurrency,
    );
  }
}

// ── Threads ────────────────────────────────────────────────────────────────

/**
 * Split `items` into at most `parts` contiguous, non-empty chunks whose sizes
 * differ by at most one. Concatenating the chunks gives back `items`.
 */
export function partition<T>(items: readonly T[], parts: number): T[][] {
  const count = Math.max(1, Math.min(parts, items.length));
  if (items.length === 0) return [];
  const base = Math.floor(items.length / count);
  const extra = items.length % count;
  const chunks: T[][] = [];
  let start = 0;
  for (let i = 0; i < count; i++) {
    const size = base + (i < extra ? 1 : 0);
    chunks.push(items.slice(start, start + size));
    start += size;
  }
  return chunks;
}

/** Sends a request to one of `size` workers. `ThreadPool` is the real one. */
export interface BatchDispatcher {
  readonly size: number;
  dispatch(index: number, request: BatchRequest): Effect.Effect<BatchResult, BatchFailure | WorkerError>;
}

/**
 * Sends one contiguous chunk per worker and stitches the answers back
 * together by chunk index.
 */
export class ThreadExecutor implements BatchExecutor {
  constructor(private readonly pool: BatchDispatcher) {}

  get concurrency(): number {
    return this.pool.size;
  }

  encode(
    texts: readonly string[],
    policy: SpecialPolicy,
  ): Effect.Effect<Int32Array[], SpecialTokenViolation | WorkerError> {
    return this._run(texts, (chunk) => ({ op: "encode", texts: chunk, policy }), tokensOf).pipe(
      Effect.mapError((error) => (error._tag === "DecodeError" ? unexpected(error.message) : error)),
    );
  }

  encodeOrdinary(texts: readonly string[]): Effect.Effect<Int32Array[], WorkerError> {
    return this._run(texts, (chunk) => ({ op: "encodeOrdinary", texts: chunk }), tokensOf).pipe(
      Effect.mapError((error) => (error._tag === "WorkerError" ? error : unexpected(error.message))),
    );
  }

  decode(batch: readonly ArrayLike<number>[], mode: DecodeMode): Effect.Effect<string[], DecodeError | WorkerError> {
    // Typed arrays clone as themselves; anything else is copied to a plain array first.
    const items = batch.map((tokens) => (tokens instanceof Int32Array ? tokens : Array.from(tokens)));
    return this._run(items, (chunk) => ({ op: "decode", batch: chunk, mode }), textsOf).pipe(
      Effect.mapError((error) => (error._tag === "SpecialTokenViolation" ? unexpected(error.message) : error)),
    );
  }

  private _run<T, R>(
    items: readonly T[],
    toRequest: (chunk: T[]) => BatchRequest,
    unpack: (result: BatchResult) => R[] | undefined,
  ) {
    const chunks = partition(items, this.pool.size);
    return forEachInOrder(
      chunks,
      (chunk, index) =>
        this.pool.dispatch(index, toRequest(chunk)).pipe(
          Effect.flatMap((result) => {
            const values = unpack(result);
            return values === undefined || values.length !== chunk.length
              ? Effect.fail(unexpected(`worker answered ${result.op} with ${values?.length ?? 0} item(s) for a chunk of ${chunk.length}`))
              : Effect.succeed(values);
          }),
        ),
      "unbounded",
    ).pipe(Effect.map((parts) => parts.flat()));
  }
}

function tokensOf(result: BatchResult): Int32Array[] | undefined {
  return result.op === "decode" ? undefined : result.value;
}

function textsOf(result: BatchResult): string[] | undefined {
  return result.op === "decode" ? result.value : undefined;
}

function unexpected(message: string): WorkerError {
  return new WorkerError({ message: `Unexpected worker reply: ${message}` });
}
