import type { LogEntry, LogLevel, LogTransport, MemoryTransportConfig } from '../types.js';

/**
 * In-process transport that keeps entries for later inspection
 */
export class MemoryTransport implements LogTransport {
  public readonly name = 'memory';
  private readonly maxEntries: number;
  private entries: LogEntry[] = [];

  constructor(config: MemoryTransportConfig = {}) {
    this.maxEntries = config.maxEntries ?? 1000;
  }

  async log(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
  }

  getEntries(level?: LogLevel): readonly LogEntry[] {
    return level === undefined ? [...this.entries] : this.entries.filter(e => e.level === level);
  }

  getMessages(): string[] {
    return this.entries.map(e => e.message);
  }

  clear(): void {
    this.entries = [];
  }
}
