import winston from 'winston';
import { AsyncLocalStorage } from 'async_hooks';

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type LogLevel = keyof typeof logLevels;

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
};

winston.addColors(logColors);

/**
 * JSON.stringify that replaces circular references with '[Circular]'
 */
function safeStringify(obj: unknown, indent?: string | number): string {
  const seen = new WeakSet();

  return JSON.stringify(
    obj,
    (_key, value) => {
      if (value === null || typeof value !== 'object') {
        return value;
      }

      if (seen.has(value)) {
        return '[Circular]';
      }

      seen.add(value);
      return value;
    },
    indent
  );
}

/**
 * Logging context carried through async calls with AsyncLocalStorage.
 *
 * @example
 * ```typescript
 * await LogContext.run({ runId: 'r-1' }, async () => {
 *   logger.info('Listing channels'); // includes runId
 *
 *   await LogContext.run({ channelId: 'C123' }, async () => {
 *     logger.debug('Classifying'); // includes runId AND channelId
 *   });
 * });
 * ```
 */
export class LogContext {
  private static storage = new AsyncLocalStorage<Record<string, unknown>>();

  /**
   * Run a function with additional logging context. Nested calls inherit the outer context,
   * inner keys win on conflict.
   */
  static run<T>(context: Record<string, unknown>, fn: () => T): T {
    const currentContext = this.storage.getStore() || {};
    const mergedContext = { ...currentContext, ...context };
    return this.storage.run(mergedContext, fn);
  }

  static getContext(): Record<string, unknown> {
    return this.storage.getStore() || {};
  }

  static hasContext(): boolean {
    return this.storage.getStore() !== undefined;
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.keys(logLevels).includes(value);
}

const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase() || '';
  return isLogLevel(envLevel) ? envLevel : 'info';
};

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

// Human-readable output for local runs
const devFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
    let logMessage = `[${timestamp}] ${level}: ${message}`;

    if (context) {
      logMessage += ` [${context}]`;
    }

    const metaStr = Object.keys(meta).length > 0 ? safeStringify(meta, 2) : '';
    if (metaStr) {
      logMessage += `\n${metaStr}`;
    }

    return logMessage;
  })
);

// One JSON object per line
const prodFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.printf((info) => safeStringify(info))
);

/**
 * Create a logger instance for a specific service. Uncaught exceptions and unhandled
 * rejections are logged, then the process exits with code 1.
 */
export function createLogger(serviceName: string): winston.Logger {
  return winston.createLogger({
    levels: logLevels,
    level: getLogLevel(),
    format: isProduction() ? prodFormat : devFormat,
    defaultMeta: {
      service: serviceName,
    },
    transports: [
      new winston.transports.Console({
        handleExceptions: true,
        handleRejections: true,
      }),
    ],
    exitOnError: true,
  });
}

/**
 * The subset of a winston logger that ContextAwareLogger writes to
 */
export interface LogSink {
  level: string;
  error(message: string, meta: Record<string, unknown>): void;
  warn(message: string, meta: Record<string, unknown>): void;
  info(message: string, meta: Record<string, unknown>): void;
  debug(message: string, meta: Record<string, unknown>): void;
}

/**
 * Logger that merges the current LogContext into every entry
 */
export class ContextAwareLogger {
  protected baseLogger: LogSink;

  constructor(baseLogger: LogSink) {
    this.baseLogger = baseLogger;
  }

  setLevel(level: LogLevel): void {
    this.baseLogger.level = level;
  }

  private formatMessage(
    message: string,
    additionalContext?: Record<string, unknown>
  ): [string, Record<string, unknown>] {
    const autoContext = LogContext.getContext();
    const meta = { ...autoContext, ...additionalContext };

    if (!isProduction()) {
      const contextParts = [];
      if (meta.runId) contextParts.push(`run:${meta.runId}`);
      if (meta.channelId) contextParts.push(`channel:${meta.channelId}`);
      if (meta.operation) contextParts.push(`op:${meta.operation}`);

      if (contextParts.length > 0) {
        meta.context = contextParts.join('|');
      }
    }

    return [message, meta];
  }

  error(
    message: string,
    error?: Error | unknown,
    additionalContext?: Record<string, unknown>
  ): void {
    const [msg, meta] = this.formatMessage(message, additionalContext);

    if (error) {
      if (error instanceof Error) {
        meta.error = {
          message: error.message,
          stack: error.stack,
          name: error.name,
        };
      } else {
        meta.error = String(error);
      }
    }

    this.baseLogger.error(msg, meta);
  }

  warn(message: string, additionalContext?: Record<string, unknown>): void {
    const [msg, meta] = this.formatMessage(message, additionalContext);
    this.baseLogger.warn(msg, meta);
  }

  info(message: string, additionalContext?: Record<string, unknown>): void {
    const [msg, meta] = this.formatMessage(message, additionalContext);
    this.baseLogger.info(msg, meta);
  }

  debug(message: string, additionalContext?: Record<string, unknown>): void {
    const [msg, meta] = this.formatMessage(message, additionalContext);
    this.baseLogger.debug(msg, meta);
  }
}

export { winston };
