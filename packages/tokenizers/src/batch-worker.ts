/**
 * Worker-thread entry for `ThreadPool`.
 */
import { parentPort, workerData } from "node:worker_threads";
import { Cause, Effect, Exit, Option } from "effect";
import {
  isWorkerInit,
  isWorkerRequest,
  runBatchRequest,
  serializeFailure,
  type WorkerRequest,
  type WorkerResponse,
} from "./batch-protocol.js";
import { Encoding } from "./encoding.js";

const init: unknown = workerData;
if (parentPort === null) throw new Error("batch-worker must run in a worker thread");
if (!isWorkerInit(init)) throw new Error("batch-worker started without encoding params");

const port = parentPort;
const encoding = Effect.runSync(Encoding.make(init.params, init.options));

function respond({ id, request }: WorkerRequest): WorkerResponse {
  const exit = Effect.runSyncExit(runBatchRequest(encoding, request));
  if (Exit.isSuccess(exit)) return { id, ok: true, result: exit.value };
  const failure = Cause.failureOption(exit.cause);
  return {
    id,
    ok: false,
    failure: Option.isSome(failure)
      ? serializeFailure(failure.value)
      : { _tag: "WorkerError", message: Cause.pretty(exit.cause) },
  };
}

port.on("message", (message: unknown) => {
  if (isWorkerRequest(message)) port.postMessage(respond(message));
});
