/**
 * @nfe-intake/shared
 *
 * Shared utilities for nfe-intake.
 *
 * @packageDocumentation
 */

export {
  createLogger,
  createSilentLogger,
  consoleSink,
  type Logger,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './logging/logger.js';
export { createFileSink, rotationPeriod, type FileSinkOptions } from './logging/file-sink.js';
export {
  IntakeError,
  ParseError,
  ExtractionError,
  PersistenceError,
  RoutingError,
  ConfigurationError,
  errorMessage,
} from './errors/errors.js';
