/**
 * Logging for the clients and the build log.
 *
 * A build step writes everything it has to say to the build log, which is
 * just a {@link Logger}; the runner decides where that ends up.
 *
 * @module observability/logging
 */

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const SENSITIVE_FIELDS = new Set([
  'password',
  'apikey',
  'api_key',
  'authorization',
  'cookie',
  'secret',
  'token',
]);

function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      result[key] = redactSensitive(Object.fromEntries(Object.entries(value)));
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  context?: Record<string, unknown>;
  /** Receives each formatted line; defaults to stdout */
  write?: (line: string) => void;
}

/**
 * Writes build log lines to the console the runner captures.
 *
 * Info lines are the bare message. Warnings and errors carry a prefix. The
 * runner stamps the time, so no timestamp is added. Context is appended as
 * JSON with secrets redacted.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
    this.write = options.write ?? ((line) => console.log(line));
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      write: this.write,
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const merged = redactSensitive({ ...this.context, ...context });
    const suffix = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
    this.write(`${LINE_PREFIX[level]}${message}${suffix}`);
  }
}

const LINE_PREFIX: Record<LogLevel, string> = {
  [LogLevel.Trace]: '[trace] ',
  [LogLevel.Debug]: '[debug] ',
  [LogLevel.Info]: '',
  [LogLevel.Warn]: 'WARNING: ',
  [LogLevel.Error]: 'ERROR: ',
};

/**
 * No-op logger for disabled logging.
 */
export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(): Logger { return this; }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: Date;
}

/**
 * In-memory logger for testing.
 */
export class InMemoryLogger implements Logger {
  private logs: LogEntry[] = [];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.context = context;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    const child = new InMemoryLogger({ ...this.context, ...context });
    // Share the logs array
    child.logs = this.logs;
    return child;
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter((log) => log.level === level);
  }

  /**
   * Messages at Info level and above, in order; what a build log reader sees.
   */
  getMessages(): string[] {
    return this.logs.filter((log) => log.level >= LogLevel.Info).map((log) => log.message);
  }

  clear(): void {
    this.logs = [];
  }

  private addLog(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.logs.push({
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date(),
    });
  }
}
