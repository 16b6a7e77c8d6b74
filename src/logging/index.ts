/**
 * Logging utilities.
 */

export { generateGenerationId, initGenerationId, getGenerationId } from "./generation-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
