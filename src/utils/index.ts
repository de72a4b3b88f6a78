/**
 * Centralized utility exports
 */

export { logger, createLogger, parseLogLevel, type LogLevel } from "./logger";
export {
  ConfigMissingError,
  ConverseError,
  InvalidArgumentError,
  NotFoundError,
  ProviderError,
  StorageError,
  errorMessage,
  hasErrorCode,
  isFatal,
  type ConverseErrorCode,
} from "./errors";
export { fallbackName, sanitizeSuggestedName, slugify } from "./slug";
