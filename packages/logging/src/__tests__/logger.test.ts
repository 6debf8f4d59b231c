/**
 * Tests for the structured logger and its transports
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  ConsoleTransport,
  LogLevel,
  Logger,
  LoggerFactory,
  MemoryTransport,
  type LogEntry,
  type LogTransport,
} from '../index.js';

// Transports are called without awaiting; let their promises settle
const flush = () => new Promise<void>(resolve => setImmediate(resolve));

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop entries below the configured level', async () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('test', 'WARN');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');
    await flush();

    expect(transport.getMessages()).toEqual(['warn message', 'error message']);
  });

  it('should parse level names case-insensitively', () => {
    expect(Logger.parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(Logger.parseLogLevel('Warning')).toBe(LogLevel.WARN);
    expect(() => Logger.parseLogLevel('verbose')).toThrow('Invalid log level: verbose');
  });

  it('should nest component names and merge context in child loggers', async () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('retry');
    const child = logger.child('async', { key: 'one' });

    child.info('registered', { attempt: 1 });
    await flush();

    const [entry] = transport.getEntries();
    expect(entry?.component).toBe('retry:async');
    expect(entry?.data).toEqual({ key: 'one', attempt: 1 });
  });

  it('should normalize non-Error values passed to error()', async () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('test');

    logger.error('failed', 'plain string');
    await flush();

    const [entry] = transport.getEntries(LogLevel.ERROR);
    expect(entry?.error).toBeInstanceOf(Error);
    expect(entry?.error?.message).toBe('plain string');
  });

  it('should report failing transports on the console', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failing: LogTransport = {
      name: 'broken',
      log: () => Promise.reject(new Error('disk full')),
    };
    const logger = new Logger({ component: 'test', level: 'INFO', transports: [failing] });

    logger.info('hello');
    await flush();

    expect(consoleError).toHaveBeenCalledWith('Transport broken failed:', expect.any(Error));
  });

  it('should stop writing to removed transports', async () => {
    const transport = new MemoryTransport();
    const logger = new Logger({ component: 'test', level: LogLevel.INFO, transports: [transport] });

    logger.removeTransport('memory');
    logger.info('ignored');
    await flush();

    expect(transport.getEntries()).toHaveLength(0);
  });
});

describe('MemoryTransport', () => {
  it('should keep at most maxEntries entries', async () => {
    const transport = new MemoryTransport({ maxEntries: 2 });
    const logger = new Logger({ component: 'test', level: 'DEBUG', transports: [transport] });

    logger.info('one');
    logger.info('two');
    logger.info('three');
    await flush();

    expect(transport.getMessages()).toEqual(['two', 'three']);
  });
});

describe('ConsoleTransport', () => {
  const entry: LogEntry = {
    timestamp: new Date('2024-01-02T03:04:05.000Z'),
    level: LogLevel.INFO,
    component: 'retry',
    message: 'attempt failed',
    data: { attempt: 2 },
  };

  it('should format plain text without colours', () => {
    const transport = new ConsoleTransport({ format: 'text', colors: false });

    expect(transport.format(entry)).toBe(
      '2024-01-02T03:04:05.000Z INFO [retry] attempt failed {"attempt":2}'
    );
  });

  it('should format JSON lines', () => {
    const transport = new ConsoleTransport({ format: 'json' });

    expect(JSON.parse(transport.format(entry))).toEqual({
      timestamp: '2024-01-02T03:04:05.000Z',
      level: 'INFO',
      component: 'retry',
      message: 'attempt failed',
      data: { attempt: 2 },
    });
  });

  it('should write through the matching console method', async () => {
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const transport = new ConsoleTransport({ colors: false });

    await transport.log({ ...entry, level: LogLevel.WARN });

    expect(consoleWarn).toHaveBeenCalledWith(
      '2024-01-02T03:04:05.000Z WARN [retry] attempt failed {"attempt":2}'
    );
    consoleWarn.mockRestore();
  });
});
