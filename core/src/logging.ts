/**
 * Structured logging for tabq
 *
 * A small logger abstraction the core accepts as an optional dependency.
 * Library code defaults to a no-op logger; the CLI wires a console logger
 * writing to stderr so that rendered tables on stdout stay clean.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@tabq/core';
 *
 * const logger = createConsoleLogger({ format: 'pretty', stream: 'stderr', minLevel: 'info' });
 * const fileLogger = withContext(logger, { source: 'phones.csv' });
 *
 * fileLogger.info('Dataset loaded', { rowsProcessed: 4 });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * JSON-compatible value allowed in log context.
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context attached to a log entry.
 */
export interface LogContext {
  /** Component emitting the entry */
  service?: string;
  /** Operation being performed (load, filter, aggregate, sort) */
  operation?: string;
  /** Input location */
  source?: string;
  /** Column the operation targets */
  column?: string;
  /** Rows read or scanned */
  rowsProcessed?: number;
  /** Rows kept by a filter */
  rowsMatched?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** ErrorCode of a logged failure */
  errorCode?: string;
  [key: string]: LogContextValue | undefined;
}

/**
 * Type guard to check if a value can be placed in a LogContext.
 */
export function isLogContextValue(value: unknown): value is LogContextValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      if (value === null) return true;
      if (Array.isArray(value)) {
        return value.every(isLogContextValue);
      }
      return Object.values(value).every(isLogContextValue);
    default:
      return false;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Sink for emitted entries */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for one JSON object per line, 'pretty' for human-readable lines (default: 'json') */
  format?: 'json' | 'pretty';
  /** Console stream to write to (default: 'stdout') */
  stream?: 'stdout' | 'stderr';
}

/**
 * Logger that keeps its entries in memory for assertions.
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Log Levels
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const LogLevels = {
  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },

  isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
  },
};

// =============================================================================
// Logger Factories
// =============================================================================

/**
 * Create a logger that hands every entry at or above `minLevel` to `output`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = error;
    }
    output(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

/**
 * Render a log entry as a single line (json) or a bracketed line (pretty).
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: { name: entry.error.name, message: entry.error.message },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  ${entry.error.name}: ${entry.error.message}`;
  }
  return line;
}

/**
 * Create a logger writing to the console.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';
  const write = config.stream === 'stderr'
    ? (line: string) => console.error(line)
    : (line: string) => console.log(line);

  return createLogger({
    minLevel: config.minLevel,
    output: (entry) => write(formatLogEntry(entry, format)),
  });
}

/**
 * Create a logger that discards everything.
 */
export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a logger that captures entries in memory.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * loadDataset(source, { logger });
 * expect(logger.getLogsByLevel('debug')[0].message).toBe('Dataset loaded');
 * ```
 */
export function createTestLogger(config: Omit<LoggerConfig, 'output'> = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({ minLevel: config.minLevel, output: (entry) => logs.push(entry) });

  return {
    ...logger,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter(entry => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Loggers
// =============================================================================

/**
 * Create a child logger that adds `context` to every entry.
 * Context given at log time wins over the inherited keys.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const merge = (local?: LogContext): LogContext =>
    local === undefined ? context : { ...context, ...local };

  return {
    debug(message: string, local?: LogContext): void {
      logger.debug(message, merge(local));
    },
    info(message: string, local?: LogContext): void {
      logger.info(message, merge(local));
    },
    warn(message: string, local?: LogContext): void {
      logger.warn(message, merge(local));
    },
    error(message: string, error?: Error, local?: LogContext): void {
      logger.error(message, error, merge(local));
    },
  };
}
