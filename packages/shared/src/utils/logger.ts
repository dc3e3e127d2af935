import { randomUUID } from 'node:crypto';
import { pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';

/**
 * Log context attached to every entry written by a logger and its children.
 */
export interface LogContext {
  /** Service/component name */
  service?: string;
  /** Component within a service (e.g. 'writer', 'pool', 'ingress') */
  component?: string;
  /** Identifier for the pipeline worker handling a record */
  workerId?: string;
  /** HTTP request ID for ingress calls */
  requestId?: string;
  /** HTTP method for ingress calls */
  method?: string;
  /** HTTP path for ingress calls */
  path?: string;
  /** Active log file the entry refers to */
  logPath?: string;
  [key: string]: string | undefined;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;
  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context.
   * The context is merged with the parent context and included in all log entries.
   */
  child(context: LogContext): Logger;

  getContext(): LogContext;
}

class ContextLogger implements Logger {
  private pino: PinoLogger;
  private context: LogContext;

  constructor(pinoInstance: PinoLogger, context: LogContext = {}) {
    this.pino = pinoInstance;
    this.context = context;
  }

  private formatData(data?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.context, ...data };
  }

  private formatError(error?: Error | unknown): Record<string, unknown> {
    if (!error) return {};
    if (error instanceof Error) {
      const stackLines = error.stack?.split('\n') ?? [];
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

      return {
        err: {
          type: error.name,
          message: error.message,
          ...(code && { code }),
          stack: stackLines.slice(0, 6).join('\n'),
        },
      };
    }
    return { err: String(error) };
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(this.formatData(data), msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(this.formatData(data), msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(this.formatData(data), msg);
  }

  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.error({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.fatal({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  child(context: LogContext): Logger {
    const mergedContext = { ...this.context, ...context };
    return new ContextLogger(this.pino.child(context), mergedContext);
  }

  getContext(): LogContext {
    return { ...this.context };
  }
}

export interface CreateLoggerOptions {
  /** Service name to include in all log entries */
  service: string;
  /** Log level (default: LOG_LEVEL env, then 'info') */
  level?: LogLevel;
  /** Force pretty printing regardless of environment */
  pretty?: boolean;
  /** Additional context to include in all log entries */
  context?: LogContext;
}

function shouldUsePretty(forceFlag?: boolean): boolean {
  if (forceFlag !== undefined) return forceFlag;
  const nodeEnv = process.env.NODE_ENV;
  return nodeEnv === 'development' || nodeEnv === 'test' || !nodeEnv;
}

function getLogLevel(configLevel?: string): string {
  return configLevel ?? process.env.LOG_LEVEL ?? 'info';
}

/**
 * Create a new logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'collector' });
 * logger.info('Starting collector');
 *
 * const workerLog = logger.child({ component: 'pool', workerId: '0' });
 * workerLog.info('Worker started'); // includes component and workerId
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const usePretty = shouldUsePretty(options.pretty);

  const pinoOptions: LoggerOptions = {
    level: getLogLevel(options.level),
    base: {
      service: options.service,
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (usePretty) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{service} | {msg}',
      },
    };
  }

  return new ContextLogger(pino(pinoOptions), options.context ?? {});
}

/**
 * Generate a unique trace ID for request correlation.
 */
export function generateTraceId(): string {
  return randomUUID();
}

/**
 * No-op logger for when logging should be disabled
 */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => nullLogger,
  getContext: () => ({}),
};

/**
 * Create a logger scoped to a service, with an optional base context.
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('collector', { component: 'server' });
 * logger.info('server_started', { address: '127.0.0.1:9513' });
 * ```
 */
export function createServiceLogger(serviceName: string, baseContext?: LogContext): Logger {
  return createLogger({
    service: serviceName,
    context: baseContext,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
