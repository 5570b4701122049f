/**
 * Command: ranktok count
 */
import { Effect } from "effect";
import { TokenizerService } from "@ranktok/core";
import { TokenizerFrom } from "@ranktok/effect-runtime";
import { parseKV, parsePolicy } from "../parse.js";
import { readInput, resolveEncoding } from "../resolve.js";
import { runCommand } from "../run.js";

export async function countCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const policy = parsePolicy(kv["allowed"]);

  await runCommand(kv, (config) =>
    Effect.gen(function* () {
      const encoding = yield* resolveEncoding(kv, config);
      const input = yield* readInput(kv);
      const tokens = yield* Effect.flatMap(TokenizerService, (tokenizer) => tokenizer.encode(input, policy)).pipe(
        Effect.provide(TokenizerFrom(encoding)),
      );
      console.log(String(tokens.length));
    }),
  );
}
