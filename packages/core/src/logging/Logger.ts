/**
 * Logger - Lightweight leveled logging for linger2ibex
 *
 * stdout carries the generated fragment, so every level is written to
 * stderr.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Parsed stimuli', { count: 48 });
 */

/**
 * Log level type
 */
export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

/**
 * Logger interface
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Destination for formatted log lines (newline already appended)
 */
export type LogSink = (line: string) => void;

/**
 * Log level priorities (higher = more verbose)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

const METHOD_LEVELS = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

/**
 * Safe JSON stringify that handles circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  return `${message} ${safeStringify(context)}`;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Console Logger writing to stderr.
 *
 * Respects log level threshold - methods below threshold are no-ops.
 */
export class ConsoleLogger implements Logger {
  private readonly priority: number;
  private readonly sink: LogSink;

  constructor(logLevel: LogLevel = 'errors', sink: LogSink = stderrSink) {
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
    this.sink = sink;
  }

  private write(methodLevel: number, tag: string, message: string, context?: Record<string, unknown>): void {
    if (this.priority < methodLevel) return;
    this.sink(formatMessage(`[${tag}] ${message}`, context) + '\n');
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write(METHOD_LEVELS.error, 'ERROR', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(METHOD_LEVELS.warn, 'WARN', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(METHOD_LEVELS.info, 'INFO', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(METHOD_LEVELS.debug, 'DEBUG', message, context);
  }
}

/**
 * Create a Logger instance with the specified log level.
 */
export function createLogger(level: LogLevel, sink?: LogSink): Logger {
  return new ConsoleLogger(level, sink);
}
