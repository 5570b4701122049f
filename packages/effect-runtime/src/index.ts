export {
  TokenizerFrom,
  EncodingLive,
  BatchService,
  BatchLive,
} from "./layers.js";

export {
  prettyLogger,
  formatLogLine,
  loggerLayer,
  withSpan,
  parseLogLevel,
} from "./logging.js";
