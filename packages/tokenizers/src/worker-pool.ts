/**
 * Worker-thread pool for batch jobs.
 *
 * Workers share nothing with the caller: each one receives the encoding
 * params at startup, builds its own `Encoding` (with its own split cache) and
 * answers `WorkerRequest`s by id. The pool lives in a `Scope`; closing the
 * scope terminates every worker.
 */
import { Worker } from "node:worker_threads";
import { Effect, type Scope } from "effect";
import {
  WorkerError,
  type BatchExecutorKind,
  type EncodingOptions,
  type EncodingParams,
} from "@ranktok/core";
import {
  isWorkerResponse,
  reviveFailure,
  type BatchFailure,
  type BatchRequest,
  type BatchResult,
  type WorkerInit,
  type WorkerRequest,
} from "./batch-protocol.js";
import { FiberExecutor, ThreadExecutor, type BatchDispatcher, type BatchExecutor } from "./batch.js";
import type { Encoding } from "./encoding.js";

/**
 * From sources the worker starts in a bootstrap that registers the tsx
 * loader for its own thread; from dist it is plain JS.
 */
function workerEntry(): URL {
  const self = import.meta.url;
  return self.endsWith(".ts") ? new URL("./batch-worker-entry.mjs", self) : new URL("./batch-worker.js", self);
}

export class ThreadPool implements BatchDispatcher {
  private _nextId = 0;
  private _broken: Error | undefined;
  private readonly _exited = new Set<Worker>();

  private constructor(private readonly _workers: readonly Worker[]) {
    for (const worker of _workers) {
      worker.on("error", (err) => {
        this._broken ??= err;
      });
      worker.on("exit", () => {
        this._exited.add(worker);
      });
    }
  }

  get size(): number {
    return this._workers.length;
  }

  /** Workers that have not exited. */
  get running(): number {
    return this._workers.length - this._exited.size;
  }

  /** Start `size` workers for `params`, terminated when the scope closes. */
  static make(
    params: EncodingParams,
    options: EncodingOptions,
    size: number,
  ): Effect.Effect<ThreadPool, WorkerError, Scope.Scope> {
    const count = Math.max(1, size);
    const entry = workerEntry();
    const init: WorkerInit = { params, options };
    return Effect.acquireRelease(
      Effect.try({
        try: () =>
          new ThreadPool(
            Array.from({ length: count }, () => new Worker(entry, { workerData: init })),
          ),
        catch: (cause) => new WorkerError({ message: `Failed to start batch workers: ${String(cause)}`, cause }),
      }).pipe(Effect.tap(() => Effect.logDebug(`started ${count} batch worker(s) for ${params.name}`))),
      (pool) => pool.terminate(),
    );
  }

  /** Send `request` to worker `index` (mod size) and wait for its answer. */
  dispatch(index: number, request: BatchRequest): Effect.Effect<BatchResult, BatchFailure | WorkerError> {
    return Effect.async<BatchResult, BatchFailure | WorkerError>((resume) => {
      if (this._broken !== undefined) {
        resume(Effect.fail(new WorkerError({ message: `Batch worker failed: ${this._broken.message}`, cause: this._broken })));
        return;
      }
      const worker = this._workers[index % this._workers.length];
      if (this._exited.has(worker)) {
        resume(Effect.fail(new WorkerError({ message: "Batch worker has exited" })));
        return;
      }
      const id = this._nextId++;

      function detach(): void {
        worker.off("message", onMessage);
        worker.off("error", onError);
        worker.off("exit", onExit);
      }
      function onMessage(message: unknown): void {
        if (!isWorkerResponse(message) || message.id !== id) return;
        detach();
        resume(message.ok ? Effect.succeed(message.result) : Effect.fail(reviveFailure(message.failure)));
      }
      function onError(err: Error): void {
        detach();
        resume(Effect.fail(new WorkerError({ message: `Batch worker failed: ${err.message}`, cause: err })));
      }
      function onExit(code: number): void {
        detach();
        resume(Effect.fail(new WorkerError({ message: `Batch worker exited with code ${code}` })));
      }

      worker.on("message", onMessage);
      worker.on("error", onError);
      worker.on("exit", onExit);
      const message: WorkerRequest = { id, request };
      worker.postMessage(message);
      return Effect.sync(detach);
    });
  }

  terminate(): Effect.Effect<void> {
    return Effect.forEach(this._workers, (worker) => Effect.promise(() => worker.terminate()), {
      discard: true,
    }).pipe(Effect.tap(() => Effect.logDebug(`terminated ${this._workers.length} batch worker(s)`)));
  }
}

/**
 * Executor of the configured kind for `encoding`. A thread executor owns a
 * pool, released with the surrounding scope.
 */
export function makeExecutor(
  encoding: Encoding,
  kind: BatchExecutorKind,
  concurrency: number,
): Effect.Effect<BatchExecutor, WorkerError, Scope.Scope> {
  switch (kind) {
    case "fiber":
      return Effect.succeed(new FiberExecutor(encoding, concurrency));
    case "thread":
      return ThreadPool.make(encoding.params, encoding.options, concurrency).pipe(
        Effect.map((pool) => new ThreadExecutor(pool)),
      );
  }
}
