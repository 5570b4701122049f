/**
 * Shared command runner: loads configuration, installs the logger and
 * reports failures on stderr with a non-zero exit code.
 */
import { Effect, Either, type Scope } from "effect";
import { loadConfig, type RanktokConfig } from "@ranktok/core";
import { loggerLayer, parseLogLevel } from "@ranktok/effect-runtime";

interface Failure {
  readonly _tag: string;
  readonly message: string;
}

export async function runCommand<E extends Failure>(
  kv: Record<string, string>,
  program: (config: RanktokConfig) => Effect.Effect<void, E, Scope.Scope>,
): Promise<void> {
  const main = Effect.gen(function* () {
    const config = yield* loadConfig(kv["config"]);
    const level = parseLogLevel(kv["log-level"] ?? config.logLevel);
    yield* Effect.scoped(program(config)).pipe(Effect.provide(loggerLayer(level)));
  });

  const result = await Effect.runPromise(Effect.either(main));
  if (Either.isLeft(result)) {
    console.error(`${result.left._tag}: ${result.left.message}`);
    process.exitCode = 1;
  }
}
