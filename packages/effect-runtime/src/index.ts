export {
  formatMessage,
  prettyLogger,
  prettyLoggerLayer,
  withSpan,
  parseLogLevel,
} from "./logging.js";
