/**
 * Command: ranktok encode
 */
import { Effect } from "effect";
import { BatchLive, BatchService, withSpan } from "@ranktok/effect-runtime";
import { boolArg, parseKV, parsePolicy } from "../parse.js";
import { readInput, resolveEncoding, splitLines } from "../resolve.js";
import { runCommand } from "../run.js";

export async function encodeCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const policy = parsePolicy(kv["allowed"]);

  await runCommand(kv, (config) =>
    withSpan(
      "cli.encode",
      Effect.gen(function* () {
        const encoding = yield* resolveEncoding(kv, config);
        const input = yield* readInput(kv);

        if (!boolArg(kv, "lines", false)) {
          const tokens = yield* encoding.encode(input, policy);
          console.log(tokens.join(" "));
          return;
        }

        // One batch item per line, one output line per item.
        const lines = splitLines(input);
        const batch = yield* Effect.flatMap(BatchService, (executor) =>
          encoding.encodeBatch(lines, policy, executor),
        ).pipe(Effect.provide(BatchLive(encoding, config)));
        yield* Effect.logDebug(`encoded ${lines.length} line(s) with ${config.batchExecutor} executor`);
        for (const tokens of batch) console.log(tokens.join(" "));
      }),
    ),
  );
}
