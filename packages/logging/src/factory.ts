import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { MemoryTransport } from './transports/memory-transport.js';
import { LogLevel, type LogFormat } from './types.js';

const normalizeLogLevel = (level: LogLevel | string): LogLevel =>
  typeof level === 'string' ? Logger.parseLogLevel(level) : level;

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger with console transport only
   */
  static createConsoleLogger(
    component: string,
    level: LogLevel | string = LogLevel.INFO,
    format: LogFormat = 'text'
  ): Logger {
    return new Logger({
      component,
      level: normalizeLogLevel(level),
      transports: [new ConsoleTransport({ format, colors: format === 'text' })],
    });
  }

  /**
   * Create a logger writing to an in-memory transport, returned alongside it
   */
  static createMemoryLogger(
    component: string,
    level: LogLevel | string = LogLevel.DEBUG
  ): { logger: Logger; transport: MemoryTransport } {
    const transport = new MemoryTransport();
    const logger = new Logger({ component, level: normalizeLogLevel(level), transports: [transport] });
    return { logger, transport };
  }
}
