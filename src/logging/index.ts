/**
 * Logging and observability utilities.
 */

export {
  generateRunId,
  generatePipelineRunId,
  slugifyTopic,
  initRunId,
  getRunId,
} from "./run-id.js";
export {
  createLogger,
  createNullLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogBindings,
  type LoggerOptions,
} from "./logger.js";
