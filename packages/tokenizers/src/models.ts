/**
 * Model name → encoding name lookup.
 */
import { readFileSync } from "node:fs";
import { Effect } from "effect";
import { LoadError, RegistryError, type ConfigError } from "@ranktok/core";
import type { Encoding } from "./encoding.js";
import { getEncoding, type EncodingRegistry } from "./public.js";

interface ModelTable {
  /** Checked in order when no exact entry matches. */
  readonly prefixes: Readonly<Record<string, string>>;
  readonly models: Readonly<Record<string, string>>;
}

const MODELS_PATH = new URL("../data/models.json", import.meta.url);

let table: ModelTable | undefined;

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

function loadModelTable(): Effect.Effect<ModelTable, LoadError> {
  if (table !== undefined) return Effect.succeed(table);
  return Effect.try({
    try: () => {
      const parsed: unknown = JSON.parse(readFileSync(MODELS_PATH, "utf-8"));
      if (typeof parsed !== "object" || parsed === null) throw new Error("expected a JSON object");
      const prefixes: unknown = Reflect.get(parsed, "prefixes");
      const models: unknown = Reflect.get(parsed, "models");
      if (!isStringRecord(prefixes) || !isStringRecord(models)) {
        throw new Error("expected string maps under \"prefixes\" and \"models\"");
      }
      table = { prefixes, models };
      return table;
    },
    catch: (cause) =>
      new LoadError({ message: `Failed to read the model table: ${String(cause)}`, cause }),
  });
}

/** Encoding name for `model`: exact entries first, then known prefixes. */
export function encodingNameForModel(model: string): Effect.Effect<string, RegistryError | LoadError> {
  return loadModelTable().pipe(
    Effect.flatMap(({ models, prefixes }) => {
      const exact = models[model];
      if (exact !== undefined) return Effect.succeed(exact);
      for (const [prefix, name] of Object.entries(prefixes)) {
        if (model.startsWith(prefix)) return Effect.succeed(name);
      }
      return Effect.fail(
        new RegistryError({
          message:
            `Could not automatically map ${model} to an encoding. ` +
            `Use getEncoding to pick the encoding you expect.`,
        }),
      );
    }),
  );
}

/** The encoding `model` uses, from `registry` or the global one. */
export function encodingForModel(
  model: string,
  registry?: EncodingRegistry,
): Effect.Effect<Encoding, RegistryError | LoadError | ConfigError> {
  return encodingNameForModel(model).pipe(
    Effect.flatMap((name) => (registry === undefined ? getEncoding(name) : registry.get(name))),
  );
}
