/**
 * Structured logging for the generation client
 */

/** `silent` drops every record; `info` writes the request and response records. */
export const LOG_LEVELS = ['silent', 'info'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: 'info';
  message: string;
  timestamp: number;
  context: LogContext;
}

export interface Logger {
  info(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/**
 * Writes one JSON line per entry to the console
 */
export class ConsoleLogger implements Logger {
  private readonly baseContext: LogContext;

  constructor(context: LogContext = {}) {
    this.baseContext = context;
  }

  info(message: string, context?: LogContext): void {
    const entry: LogEntry = {
      level: 'info',
      message,
      timestamp: Date.now(),
      context: { ...this.baseContext, ...context },
    };

    console.info(JSON.stringify(entry));
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({ ...this.baseContext, ...context });
  }
}

/**
 * No-op logger for when logging is disabled
 */
export class NoopLogger implements Logger {
  info(_message: string, _context?: LogContext): void {}
  child(_context: LogContext): Logger {
    return this;
  }
}

/**
 * In-memory logger for testing
 *
 * Children share the parent's entry list so records written through a child
 * are visible on the logger handed to the client.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly baseContext: LogContext;

  constructor(context: LogContext = {}, entries: LogEntry[] = []) {
    this.baseContext = context;
    this.entries = entries;
  }

  info(message: string, context?: LogContext): void {
    this.entries.push({
      level: 'info',
      message,
      timestamp: Date.now(),
      context: { ...this.baseContext, ...context },
    });
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.baseContext, ...context }, this.entries);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * Create a logger for the given level
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return level === 'silent' ? new NoopLogger() : new ConsoleLogger();
}
