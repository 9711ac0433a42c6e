export {
  TokenizerFrom,
  TokenizerLive,
  TokenizerPreset,
} from "./layers.js";

export {
  prettyLogger,
  loggerLayer,
  formatMessage,
  withSpan,
  parseLogLevel,
} from "./logging.js";
