/**
 * Logging module - Structured logging for retrykit packages
 *
 * Features:
 * - Structured logging with JSON and text formats
 * - Console and in-memory transports
 * - Child loggers with nested component names and bound context
 */

export { Logger } from './logger.js';
export { LoggerFactory } from './factory.js';

export { LogLevel, LOG_LEVELS, LOG_FORMATS } from './types.js';

export type {
  LogData,
  LogEntry,
  LogFormat,
  LogLevelString,
  LogTransport,
  LoggerConfig,
  ConsoleTransportConfig,
  MemoryTransportConfig,
} from './types.js';

export { ConsoleTransport } from './transports/console-transport.js';
export { MemoryTransport } from './transports/memory-transport.js';
