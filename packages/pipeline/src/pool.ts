import { ConfigError, isFatalError, nullLogger, type Logger } from '@logsink/shared';
import type { LogSink, Payload } from '@logsink/rotating-file';
import { PipelineContext } from './context.js';
import { WorkQueue } from './queue.js';

export interface WorkerPoolOptions {
  /** Destination every worker forwards records to */
  sink: LogSink;
  /** Number of workers, fixed for the pool's lifetime */
  size: number;
  /** Queue capacity (default: `size`) */
  capacity?: number;
  context?: PipelineContext;
  logger?: Logger;
  /**
   * Called once, with the first fatal sink error, after the queue has been
   * closed. The pool does not exit the process itself.
   */
  onFatal?: (error: Error) => void;
}

function byteLength(payload: Payload): number {
  return typeof payload === 'string' ? Buffer.byteLength(payload) : payload.byteLength;
}

/**
 * Fixed set of workers draining a bounded queue into a single sink.
 *
 * A failed append is logged, counted and dropped; the worker moves on to the
 * next record. A fatal sink error (a failed rollover) closes the queue, stops
 * the worker that saw it and is reported through `onFatal`.
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool({ sink: writer, size: 2, onFatal: shutdown });
 * pool.start();
 * await pool.submit(Buffer.from('{"status":200}'));
 * await pool.stop(); // closes the queue and waits for the workers to drain it
 * ```
 */
export class WorkerPool {
  readonly queue: WorkQueue<Payload>;
  readonly context: PipelineContext;
  readonly size: number;
  private readonly sink: LogSink;
  private readonly logger: Logger;
  private readonly onFatal?: (error: Error) => void;
  private workers: Promise<void>[] = [];
  private fatalError: Error | null = null;

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new ConfigError(`Invalid worker count ${options.size} (expected a positive integer)`, 'workers');
    }
    this.size = options.size;
    this.sink = options.sink;
    this.queue = new WorkQueue<Payload>(options.capacity ?? options.size);
    this.context = options.context ?? new PipelineContext();
    this.logger = (options.logger ?? nullLogger).child({ component: 'pool' });
    this.onFatal = options.onFatal;
  }

  start(): void {
    if (this.workers.length > 0) return;

    for (let i = 0; i < this.size; i++) {
      this.workers.push(this.runWorker(i));
    }
    this.logger.info('worker_pool_started', { workers: this.size, capacity: this.queue.capacity });
  }

  /**
   * Queue a record, waiting while the queue is full.
   *
   * @throws QueueClosedError once the pool is stopping
   */
  submit(payload: Payload): Promise<void> {
    return this.queue.enqueue(payload);
  }

  /**
   * Queue a record only if there is room right now.
   *
   * @throws QueueClosedError once the pool is stopping
   */
  trySubmit(payload: Payload): boolean {
    return this.queue.tryEnqueue(payload);
  }

  /**
   * Close the queue and wait until every worker has drained it and exited.
   */
  async stop(): Promise<void> {
    this.queue.close();
    await Promise.all(this.workers);
    this.logger.info('worker_pool_stopped', {
      handled: this.context.handled,
      failed: this.context.failed,
      dropped: this.context.dropped,
    });
  }

  get running(): boolean {
    return this.workers.length > 0 && !this.queue.closed;
  }

  /** First fatal sink error, if one occurred. */
  get fatal(): Error | null {
    return this.fatalError;
  }

  private async runWorker(index: number): Promise<void> {
    const log = this.logger.child({ workerId: String(index) });
    log.debug('worker_started');

    for await (const payload of this.queue) {
      try {
        await this.sink.write(payload);
        this.context.recordHandled();
      } catch (error) {
        if (isFatalError(error)) {
          this.escalate(error, log);
          return;
        }
        this.context.recordFailed();
        log.error('log_write_failed', error, { bytes: byteLength(payload) });
      }
    }

    log.debug('worker_stopped');
  }

  private escalate(error: unknown, log: Logger): void {
    if (this.fatalError) return;

    const fatal = error instanceof Error ? error : new Error(String(error));
    this.fatalError = fatal;
    this.queue.close();
    log.fatal('pipeline_fatal_error', fatal, { queued: this.queue.size });

    try {
      this.onFatal?.(fatal);
    } catch (handlerError) {
      log.error('fatal_handler_failed', handlerError);
    }
  }
}
