export { encodeCmd } from "./commands/encode.js";
export { decodeCmd } from "./commands/decode.js";
export { countCmd } from "./commands/count.js";
export { listCmd } from "./commands/list.js";
export { exportCmd } from "./commands/export.js";
export { parseKV, parsePolicy, parseTokens, parseDecodeMode, strArg, boolArg } from "./parse.js";
export { resolveEncoding, readInput, readTokens, splitLines, UsageError, DEFAULT_ENCODING } from "./resolve.js";
export { runCommand } from "./run.js";
