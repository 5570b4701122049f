/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** Invalid tables, pattern or configuration. Fatal at construction. */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Input text contains a special-token literal the policy forbids. */
export class SpecialTokenViolation extends Data.TaggedError("SpecialTokenViolation")<{
  readonly message: string;
  /** First offending literal in text order. */
  readonly literal: string;
  /** Every distinct offending literal, in order of first occurrence. */
  readonly literals: readonly string[];
}> {}

export class DecodeError extends Data.TaggedError("DecodeError")<{
  readonly message: string;
  /** The unknown rank, when that is the reason. */
  readonly token?: number;
  readonly cause?: unknown;
}> {}

export class EncodeError extends Data.TaggedError("EncodeError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class LoadError extends Data.TaggedError("LoadError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class RegistryError extends Data.TaggedError("RegistryError")<{
  readonly message: string;
}> {}

export class WorkerError extends Data.TaggedError("WorkerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Build the violation for a list of offending literals (at least one). */
export function specialTokenViolation(literals: readonly string[]): SpecialTokenViolation {
  const literal = literals[0] ?? "";
  return new SpecialTokenViolation({
    message:
      `Encountered text corresponding to disallowed special token "${literal}". ` +
      `Allow it in the special-token policy to encode it as a special token, ` +
      `or use encodeOrdinary to encode it as plain text.`,
    literal,
    literals,
  });
}
