/**
 * Error taxonomy shared by the writer, the pipeline and the collector.
 *
 * Every error carries a stable `code` so HTTP handlers and logs can classify
 * it without string matching. `fatal` marks errors after which the component
 * that raised them can no longer uphold its invariants.
 */

export abstract class LogsinkError extends Error {
  abstract readonly code: string;
  readonly fatal: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid configuration: unknown rotation granularity, non-positive pool
 * size, malformed flag value. Raised before any side effect.
 */
export class ConfigError extends LogsinkError {
  readonly code = 'CONFIG_ERROR';

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

/**
 * Filesystem failure on a specific path.
 */
export class IOError extends LogsinkError {
  readonly code: string = 'IO_ERROR';

  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * Rename or reopen failed in the middle of a rollover. The writer no longer
 * has a valid handle at its base path and refuses further writes.
 */
export class RolloverError extends IOError {
  override readonly code = 'ROLLOVER_ERROR';
  override readonly fatal = true;

  constructor(
    message: string,
    path: string,
    public readonly stage: 'rename' | 'reopen',
    cause?: unknown,
  ) {
    super(message, path, cause);
  }
}

/**
 * Push attempted on a queue that has been closed for shutdown.
 */
export class QueueClosedError extends LogsinkError {
  readonly code = 'QUEUE_CLOSED';

  constructor(message = 'Queue is closed') {
    super(message);
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof LogsinkError && error.fatal;
}

/**
 * Extract the errno code (ENOENT, EACCES, ...) from a Node.js system error.
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
