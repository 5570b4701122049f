#!/usr/bin/env tsx
/**
 * ranktok CLI: the main entry point.
 *
 * Commands: encode, decode, count, list, export
 */
import { encodeCmd } from "./commands/encode.js";
import { decodeCmd } from "./commands/decode.js";
import { countCmd } from "./commands/count.js";
import { listCmd } from "./commands/list.js";
import { exportCmd } from "./commands/export.js";

const USAGE = `
ranktok: byte-level BPE tokenizer

Commands:
  encode           Encode text to token ids
  decode           Decode token ids to text
  count            Count the tokens of a text
  list             List the named encodings
  export           Write an encoding's ranks to a .tiktoken file

Options:
  --encoding=name  Named encoding (default cl100k_base)
  --model=name     Pick the encoding a model uses
  --ranks=path     Use a local .tiktoken file (with --pattern=regex)
  --text=...       Input text (else --file=path, else stdin)
  --tokens=1,2,3   Token ids for decode
  --allowed=...    Special tokens to recognise: all, none, or a,b,c
  --lossy          Replace invalid UTF-8 with U+FFFD when decoding
  --lines          Treat each input line as one batch item
  --config=path    JSON configuration file
  --log-level=lvl  debug, info, warn, error or none
  --help, -h       Show this help

Examples:
  ranktok encode --encoding=cl100k_base --text="hello world"
  ranktok decode --model=gpt-4 --tokens=15339,1917
  ranktok count --file=README.md --allowed=all
  ranktok encode --lines --file=corpus.txt --config=ranktok.json
  ranktok export --encoding=r50k_base --out=vocab/r50k_base.tiktoken
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];
  const rest = args.slice(1);

  if (command === "encode") {
    await encodeCmd(rest);
  } else if (command === "decode") {
    await decodeCmd(rest);
  } else if (command === "count") {
    await countCmd(rest);
  } else if (command === "list") {
    await listCmd(rest);
  } else if (command === "export") {
    await exportCmd(rest);
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
