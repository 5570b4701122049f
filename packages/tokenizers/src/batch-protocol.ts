/**
 * Batch requests as plain data, shared by the in-process executor and the
 * worker threads. Everything here survives structured cloning.
 */
import { Effect } from "effect";
import {
  DecodeError,
  SpecialTokenViolation,
  WorkerError,
  type DecodeMode,
  type EncodingOptions,
  type EncodingParams,
  type SpecialPolicy,
} from "@ranktok/core";
import type { Encoding } from "./encoding.js";

export type BatchRequest =
  | { readonly op: "encode"; readonly texts: readonly string[]; readonly policy: SpecialPolicy }
  | { readonly op: "encodeOrdinary"; readonly texts: readonly string[] }
  | { readonly op: "decode"; readonly batch: readonly ArrayLike<number>[]; readonly mode: DecodeMode };

export type BatchResult =
  | { readonly op: "encode" | "encodeOrdinary"; readonly value: Int32Array[] }
  | { readonly op: "decode"; readonly value: string[] };

export type BatchFailure = SpecialTokenViolation | DecodeError;

/** Run every item of `request` in order, stopping at the first failure. */
export function runBatchRequest(
  encoding: Encoding,
  request: BatchRequest,
): Effect.Effect<BatchResult, BatchFailure> {
  switch (request.op) {
    case "encode": {
      const { texts, policy } = request;
      return Effect.forEach(texts, (text) => encoding.encode(text, policy)).pipe(
        Effect.map((value) => ({ op: "encode" as const, value })),
      );
    }
    case "encodeOrdinary": {
      const { texts } = request;
      return Effect.sync(() => ({
        op: "encodeOrdinary" as const,
        value: texts.map((text) => encoding.encodeOrdinary(text)),
      }));
    }
    case "decode": {
      const { batch, mode } = request;
      return Effect.forEach(batch, (tokens) => encoding.decode(tokens, mode)).pipe(
        Effect.map((value) => ({ op: "decode" as const, value })),
      );
    }
  }
}

// ── Worker messages ──────────────────────────────────────────────────────

export interface WorkerInit {
  readonly params: EncodingParams;
  readonly options: EncodingOptions;
}

export interface WorkerRequest {
  readonly id: number;
  readonly request: BatchRequest;
}

export type SerializedFailure =
  | { readonly _tag: "SpecialTokenViolation"; readonly message: string; readonly literal: string; readonly literals: readonly string[] }
  | { readonly _tag: "DecodeError"; readonly message: string; readonly token?: number }
  | { readonly _tag: "WorkerError"; readonly message: string };

export type WorkerResponse =
  | { readonly id: number; readonly ok: true; readonly result: BatchResult }
  | { readonly id: number; readonly ok: false; readonly failure: SerializedFailure };

export function serializeFailure(error: BatchFailure): SerializedFailure {
  switch (error._tag) {
    case "SpecialTokenViolation":
      return { _tag: error._tag, message: error.message, literal: error.literal, literals: error.literals };
    case "DecodeError":
      return error.token === undefined
        ? { _tag: error._tag, message: error.message }
        : { _tag: error._tag, message: error.message, token: error.token };
  }
}

export function reviveFailure(failure: SerializedFailure): BatchFailure | WorkerError {
  switch (failure._tag) {
    case "SpecialTokenViolation":
      return new SpecialTokenViolation({
        message: failure.message,
        literal: failure.literal,
        literals: failure.literals,
      });
    case "DecodeError":
      return failure.token === undefined
        ? new DecodeError({ message: failure.message })
        : new DecodeError({ message: failure.message, token: failure.token });
    case "WorkerError":
      return new WorkerError({ message: failure.message });
  }
}

// ── Message guards ───────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isWorkerInit(value: unknown): value is WorkerInit {
  if (!isRecord(value) || !isRecord(value["params"]) || !isRecord(value["options"])) return false;
  const params = value["params"];
  return (
    typeof params["name"] === "string" &&
    typeof params["patStr"] === "string" &&
    params["mergeableRanks"] instanceof Map &&
    isRecord(params["specialTokens"])
  );
}

export function isWorkerRequest(value: unknown): value is WorkerRequest {
  if (!isRecord(value) || typeof value["id"] !== "number" || !isRecord(value["request"])) return false;
  const op = value["request"]["op"];
  return op === "encode" || op === "encodeOrdinary" || op === "decode";
}

export function isWorkerResponse(value: unknown): value is WorkerResponse {
  return isRecord(value) && typeof value["id"] === "number" && typeof value["ok"] === "boolean";
}
