/**
 * Command: ranktok export
 */
import { Effect } from "effect";
import { saveRanks } from "@ranktok/tokenizers";
import { parseKV } from "../parse.js";
import { resolveEncoding, UsageError } from "../resolve.js";
import { runCommand } from "../run.js";

export async function exportCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);

  await runCommand(kv, (config) =>
    Effect.gen(function* () {
      const out = kv["out"];
      if (!out) return yield* Effect.fail(new UsageError({ message: "Missing required argument: --out (path for the .tiktoken file)" }));
      const encoding = yield* resolveEncoding(kv, config);
      yield* saveRanks(out, encoding.params.mergeableRanks);
      console.log(`Saved ${encoding.table.ordinaryCount} ranks of ${encoding.name} to ${out}`);
    }),
  );
}
