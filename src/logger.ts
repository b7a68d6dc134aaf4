/**
 * Context logger used by every sync component
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  /** ISO timestamp of the log entry. */
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  /** The component the log originated from. */
  context: string;
  message: string;
  data?: unknown;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
  /** Logger for a sub-component, sharing level and sink */
  child(context: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function formatMessage(context: string, message: string): string {
  return `[${context}] ${message}`;
}

/**
 * Writes to the console method matching the level
 */
export const consoleSink: LogSink = {
  write(entry: LogEntry): void {
    const line = formatMessage(entry.context, entry.message);
    const extra = entry.data !== undefined ? entry.data : '';
    switch (entry.level) {
      case 'debug':
        console.debug(line, extra);
        break;
      case 'info':
        console.log(line, extra);
        break;
      case 'warn':
        console.warn(line, extra);
        break;
      case 'error':
        console.error(line, extra);
        break;
    }
  },
};

class ContextLogger implements Logger {
  constructor(
    private readonly context: string,
    private readonly level: LogLevel,
    private readonly sink: LogSink
  ) {}

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: unknown): void {
    this.write('error', message, error);
  }

  child(context: string): Logger {
    return new ContextLogger(`${this.context}:${context}`, this.level, this.sink);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, data: unknown): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) return;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
    };
    if (data !== undefined) entry.data = data;
    this.sink.write(entry);
  }
}

export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  return new ContextLogger(context, options.level ?? 'info', options.sink ?? consoleSink);
}

/**
 * Logger that drops everything, for tests and embedding
 */
export function createSilentLogger(): Logger {
  return createLogger('silent', { level: 'silent' });
}

/**
 * Sink that keeps entries in memory
 */
export class MemoryLogSink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogEntry['level']): string[] {
    return this.entries.filter(entry => level === undefined || entry.level === level).map(entry => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
