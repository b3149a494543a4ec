/**
 * graphtx Structured Logging
 *
 * Structured logging with trace IDs, log levels, JSON output and pluggable
 * sinks. The client hands child loggers to its connection pool and to every
 * transaction, so each entry carries the component and transaction it came
 * from.
 *
 * @packageDocumentation
 */

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Log levels supported by the structured logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Numeric log level values for comparison
 */
export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Compare two log levels
 * @returns negative if a < b, positive if a > b, 0 if equal
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LOG_LEVEL_VALUES[a] - LOG_LEVEL_VALUES[b];
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/**
 * Get log level from the environment.
 *
 * Reads `GRAPHTX_LOG_LEVEL`, then `LOG_LEVEL`; defaults to `info`.
 */
export function getLogLevelFromEnv(env: Record<string, string | undefined> = process.env): LogLevel {
  const envLevel = (env.GRAPHTX_LOG_LEVEL ?? env.LOG_LEVEL)?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Trace ID for correlating entries of one client */
  traceId: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: string;
    message: string;
    stack?: string;
  };
}

/**
 * Custom log sink interface
 */
export interface LogSink {
  write(entry: LogEntry): void;
  flush?(): void | Promise<void>;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  sink?: LogSink;
  /** Whether to include stack traces */
  includeStackTraces?: boolean;
  /** Context merged into every entry */
  defaultContext?: Record<string, unknown>;
  traceId?: string;
}

/**
 * Structured logger interface
 */
export interface StructuredLogger {
  debug(message: string | (() => string), context?: Record<string, unknown>): void;
  info(message: string | (() => string), context?: Record<string, unknown>): void;
  warn(message: string | (() => string), context?: Record<string, unknown>): void;
  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): StructuredLogger;

  getTraceId(): string;
  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;

  /** Flush any buffered log entries */
  flush(): Promise<void>;
}

// =============================================================================
// Utility Functions
// =============================================================================

function generateTraceId(): string {
  return crypto.randomUUID();
}

/**
 * Make a value safe for JSON.stringify: cuts cycles, turns bigints into
 * decimal strings.
 */
function toJsonSafe(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => toJsonSafe(item, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    result[key] = toJsonSafe(item, seen);
  }
  return result;
}

function toJsonSafeRecord(record: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>([record]);
  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(record)) {
    result[key] = toJsonSafe(item, seen);
  }
  return result;
}

/**
 * Format message with placeholder substitution
 * Template syntax: {fieldName}
 */
function formatMessage(template: string, context?: Record<string, unknown>): string {
  if (!context) return template;

  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => {
    if (key in context) {
      return String(context[key]);
    }
    return match;
  });
}

// =============================================================================
// Logger Implementation
// =============================================================================

class Logger implements StructuredLogger {
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly defaultContext: Record<string, unknown>;
  private readonly includeStackTraces: boolean;
  private readonly traceId: string;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getLogLevelFromEnv();
    this.sink = config.sink ?? new ConsoleSink();
    this.defaultContext = config.defaultContext ?? {};
    this.includeStackTraces = config.includeStackTraces ?? true;
    this.traceId = config.traceId ?? generateTraceId();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  private log(
    level: LogLevel,
    messageOrFn: string | (() => string),
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const rawMessage = typeof messageOrFn === 'function' ? messageOrFn() : messageOrFn;

    const mergedContext = context ? { ...this.defaultContext, ...context } : this.defaultContext;
    const hasContext = Object.keys(mergedContext).length > 0;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: formatMessage(rawMessage, hasContext ? mergedContext : undefined),
      traceId: this.traceId,
    };

    if (hasContext) {
      entry.context = toJsonSafeRecord(mergedContext);
    }

    if (error) {
      entry.error = { name: error.name, message: error.message };
      if ('code' in error && typeof error.code === 'string') {
        entry.error.code = error.code;
      }
      if (this.includeStackTraces && error.stack) {
        entry.error.stack = error.stack;
      }
    }

    this.sink.write(entry);
  }

  debug(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      defaultContext: { ...this.defaultContext, ...context },
      includeStackTraces: this.includeStackTraces,
      traceId: this.traceId,
    });
  }

  getTraceId(): string {
    return this.traceId;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  async flush(): Promise<void> {
    if (this.sink.flush) {
      await this.sink.flush();
    }
  }
}

/**
 * Create a new structured logger
 */
export function createLogger(config?: LoggerConfig): StructuredLogger {
  return new Logger(config);
}

// =============================================================================
// Built-in Sinks
// =============================================================================

/**
 * Console sink options
 */
export interface ConsoleSinkOptions {
  /** Enable colorized output */
  colorize?: boolean;
  prettyPrint?: boolean;
}

/**
 * Console sink. Warnings and errors go to stderr.
 */
export class ConsoleSink implements LogSink {
  private readonly colorize: boolean;
  private readonly prettyPrint: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colorize = options.colorize ?? false;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    const output = this.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry);
    const line = this.colorize ? `${COLORS[entry.level]}${output}\x1b[0m` : output;

    if (entry.level === 'warn' || entry.level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

/**
 * JSON sink options
 */
export interface JsonSinkOptions {
  /** Write function for output */
  write: (json: string) => void;
  prettyPrint?: boolean;
}

/**
 * JSON sink for structured output
 */
export class JsonSink implements LogSink {
  private readonly writeFn: (json: string) => void;
  private readonly prettyPrint: boolean;

  constructor(options: JsonSinkOptions) {
    this.writeFn = options.write;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    this.writeFn(this.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
  }
}

/**
 * Sink that drops everything
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {
    // Intentionally empty
  }
}

/**
 * Multi-sink for fan-out to multiple destinations
 */
export class MultiSink implements LogSink {
  private readonly sinks: LogSink[];

  constructor(sinks: LogSink[]) {
    this.sinks = sinks;
  }

  write(entry: LogEntry): void {
    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }

  async flush(): Promise<void> {
    await Promise.all(
      this.sinks.map(async (sink) => {
        if (sink.flush) {
          await sink.flush();
        }
      })
    );
  }
}
