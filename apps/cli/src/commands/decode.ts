/**
 * Command: ranktok decode
 */
import { Effect } from "effect";
import { BatchLive, BatchService, withSpan } from "@ranktok/effect-runtime";
import { boolArg, parseDecodeMode, parseKV, parseTokens } from "../parse.js";
import { readInput, readTokens, resolveEncoding, splitLines, UsageError } from "../resolve.js";
import { runCommand } from "../run.js";

export async function decodeCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const mode = parseDecodeMode(kv);

  await runCommand(kv, (config) =>
    withSpan(
      "cli.decode",
      Effect.gen(function* () {
        const encoding = yield* resolveEncoding(kv, config);

        if (!boolArg(kv, "lines", false)) {
          const tokens = yield* readTokens(kv);
          console.log(yield* encoding.decode(tokens, mode));
          return;
        }

        const input = yield* readInput(kv);
        const batch = yield* Effect.try({
          try: () => splitLines(input).map(parseTokens),
          catch: (cause) => new UsageError({ message: cause instanceof Error ? cause.message : String(cause), cause }),
        });
        const texts = yield* Effect.flatMap(BatchService, (executor) =>
          encoding.decodeBatch(batch, mode, executor),
        ).pipe(Effect.provide(BatchLive(encoding, config)));
        for (const text of texts) console.log(text);
      }),
    ),
  );
}
