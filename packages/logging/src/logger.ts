import { toError } from '@retrykit/errors';

import { ConsoleTransport } from './transports/console-transport.js';
import { LogLevel, type LogEntry, type LogData, type LogTransport, type LoggerConfig } from './types.js';

/**
 * Structured logger with multiple transport support
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string;
  private readonly context: LogData | undefined;
  private transports: LogTransport[];

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level = typeof config.level === 'string' ? Logger.parseLogLevel(config.level) : config.level;
    this.context = config.context;
    this.transports = config.transports || [new ConsoleTransport()];
  }

  /**
   * Create a child logger sharing transports, with a nested component name
   * and extra context fields merged into every entry.
   */
  child(component: string, context?: LogData): Logger {
    const merged = this.context || context ? { ...this.context, ...context } : undefined;
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: this.transports,
      ...(merged && { context: merged }),
    });
  }

  debug(message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log(LogLevel.WARN, message, data);
  }

  /**
   * Log an error message; non-Error values are normalized
   */
  error(message: string, error?: unknown, data?: LogData): void {
    const errorObj = error === undefined ? undefined : toError(error);
    this.log(LogLevel.ERROR, message, data, errorObj);
  }

  setLevel(level: LogLevel | string): void {
    this.level = typeof level === 'string' ? Logger.parseLogLevel(level) : level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getComponent(): string {
    return this.component;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  removeTransport(transportName: string): void {
    this.transports = this.transports.filter(t => t.name !== transportName);
  }

  /**
   * Close all transports
   */
  async close(): Promise<void> {
    await Promise.all(
      this.transports
        .filter((t): t is LogTransport & { close: () => Promise<void> } => !!t.close)
        .map(t => t.close())
    );
  }

  /**
   * Parse a level name, accepting any case and WARNING as an alias of WARN
   */
  static parseLogLevel(level: string): LogLevel {
    switch (level.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
      case 'WARNING':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        throw new Error(`Invalid log level: ${level}`);
    }
  }

  private log(level: LogLevel, message: string, data?: LogData, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const fields = this.context || data ? { ...this.context, ...data } : undefined;
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(fields && { data: fields }),
      ...(error && { error }),
    };

    this.transports.forEach(transport => {
      transport.log(entry).catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(`Transport ${transport.name} failed:`, err);
      });
    });
  }
}
