/**
 * @channel-pulse/core
 * Configuration, logging and errors shared by every workspace
 */

// Config
export {
  loadConfig,
  getConfig,
  resetConfig,
  type AppConfig,
  type AppEnv,
  type TableStoreConfig,
  type AnswerProviderConfig,
} from "./config.js";

// Logger
export {
  logger,
  jsonHandler,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  ChannelPulseError,
  ConfigurationError,
  ResolutionError,
  UpstreamTransportError,
  ValidationError,
  isChannelPulseError,
  describeError,
} from "./errors.js";
