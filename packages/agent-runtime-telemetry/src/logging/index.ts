export {
  createLogger,
  createRuntimeLogger,
  getLogger,
  type LoggerConfig,
  type LogLevel,
  type Logger,
  parseLogLevel,
  type RuntimeLogger,
  wrapLogger,
} from "./logger";
