import { mkdir, open, rename, stat, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  IOError,
  LOG_DIR_MODE,
  LOG_FILE_MODE,
  RolloverError,
  errorMessage,
  nullLogger,
  systemErrorCode,
  type Logger,
} from '@logsink/shared';
import { formatSuffix, intervalSeconds, parseGranularity, type Granularity } from './granularity.js';
import { Mutex } from './lock.js';

export type Payload = Uint8Array | string;

/**
 * Destination for pipeline records. `write` resolves with the number of bytes
 * appended, including the record terminator.
 */
export interface LogSink {
  write(payload: Payload): Promise<number>;
  close(): Promise<void>;
}

/**
 * How `rolloverAt` is recomputed after a rollover.
 *
 * - `lazy`: `now + interval`. A writer that stayed idle across several
 *   boundaries produces one file spanning all of them.
 * - `aligned`: the previous `rolloverAt` advanced by whole intervals until it
 *   is in the future, so boundaries stay on the initial grid.
 */
export type RolloverSchedule = 'lazy' | 'aligned';

export interface RotatingFileWriterOptions {
  /** Time source for rollover checks and rename suffixes */
  clock?: () => Date;
  schedule?: RolloverSchedule;
  logger?: Logger;
}

const NEWLINE = Buffer.from('\n');

function toSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function toLine(payload: Payload): Buffer {
  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
  return Buffer.concat([body, NEWLINE]);
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Appends records to a single active file and renames it with a timestamp
 * suffix once per interval.
 *
 * The rollover check, the rollover itself and the append run inside one
 * critical section, so concurrent callers never write into a half-rotated
 * file and never race each other on the rename.
 *
 * @example
 * ```typescript
 * const writer = await RotatingFileWriter.open('/var/log/logsink/access.log', 'hour', 1);
 * await writer.write(Buffer.from('{"status":200}'));
 * // after the hour: access.log2024-05-01_13 holds the record, access.log is empty
 * ```
 */
export class RotatingFileWriter implements LogSink {
  private handle: FileHandle | null;
  private nextRolloverAt: number;
  private failure: RolloverError | null = null;
  private shutDown = false;
  private readonly lock = new Mutex();
  private readonly clock: () => Date;
  private readonly schedule: RolloverSchedule;
  private readonly logger: Logger;

  private constructor(
    readonly basePath: string,
    readonly granularity: Granularity,
    readonly intervalSeconds: number,
    handle: FileHandle,
    rolloverAt: number,
    options: RotatingFileWriterOptions,
  ) {
    this.handle = handle;
    this.nextRolloverAt = rolloverAt;
    this.clock = options.clock ?? (() => new Date());
    this.schedule = options.schedule ?? 'lazy';
    this.logger = (options.logger ?? nullLogger).child({ component: 'writer', logPath: basePath });
  }

  /**
   * Open (or create) `basePath` for appending. The first rollover is due one
   * interval after the file's last modification.
   *
   * @throws ConfigError for an unknown granularity or a non-positive multiplier; nothing is created
   * @throws IOError when the directory cannot be created or the file cannot be opened
   */
  static async open(
    basePath: string,
    granularity: string,
    multiplier: number,
    options: RotatingFileWriterOptions = {},
  ): Promise<RotatingFileWriter> {
    const unit = parseGranularity(granularity);
    const interval = intervalSeconds(unit, multiplier);

    const dir = dirname(basePath);
    try {
      await mkdir(dir, { recursive: true, mode: LOG_DIR_MODE });
    } catch (error) {
      throw new IOError(`Cannot create log directory ${dir}`, dir, error);
    }

    let handle: FileHandle;
    try {
      handle = await open(basePath, 'a', LOG_FILE_MODE);
    } catch (error) {
      throw new IOError(`Cannot open log file ${basePath}`, basePath, error);
    }

    let modifiedAt: number;
    try {
      modifiedAt = Math.floor((await handle.stat()).mtimeMs / 1000);
    } catch (error) {
      await handle.close();
      throw new IOError(`Cannot stat log file ${basePath}`, basePath, error);
    }

    const writer = new RotatingFileWriter(basePath, unit, interval, handle, modifiedAt + interval, options);
    writer.logger.debug('log_file_opened', { rolloverAt: modifiedAt + interval, intervalSeconds: interval });
    return writer;
  }

  /** Next scheduled rollover, in seconds since the epoch. */
  get rolloverAt(): number {
    return this.nextRolloverAt;
  }

  get closed(): boolean {
    return this.shutDown || this.handle === null;
  }

  /**
   * Append `payload` plus a newline, rolling the file over first when due.
   *
   * @throws RolloverError when the rename or reopen fails; every later call rejects with the same error
   * @throws IOError when the append itself fails
   */
  async write(payload: Payload): Promise<number> {
    const line = toLine(payload);

    return this.lock.runExclusive(async () => {
      if (this.failure) throw this.failure;
      if (this.shutDown) {
        throw new IOError(`Log file ${this.basePath} is closed`, this.basePath);
      }

      const now = this.clock();
      if (this.nextRolloverAt <= toSeconds(now)) {
        await this.rollover(now);
      }

      const handle = this.handle;
      if (!handle) {
        throw new IOError(`Log file ${this.basePath} is closed`, this.basePath);
      }

      try {
        await handle.appendFile(line);
      } catch (error) {
        throw new IOError(`Failed to append to ${this.basePath}`, this.basePath, error);
      }
      return line.byteLength;
    });
  }

  /**
   * Close the active file. Closing twice rejects, except after a failed
   * rollover left the writer without a handle.
   */
  async close(): Promise<void> {
    return this.lock.runExclusive(async () => {
      if (this.shutDown) {
        if (this.failure) return;
        throw new IOError(`Log file ${this.basePath} is already closed`, this.basePath);
      }
      this.shutDown = true;

      const handle = this.handle;
      this.handle = null;
      // A failed rollover leaves no handle to release.
      if (!handle) return;

      try {
        await handle.close();
      } catch (error) {
        throw new IOError(`Failed to close ${this.basePath}`, this.basePath, error);
      }
      this.logger.debug('log_file_closed');
    });
  }

  // Caller holds the lock.
  private async rollover(now: Date): Promise<void> {
    let target: string;
    try {
      target = await this.rotatedPath(now);
    } catch (error) {
      throw this.fail('rename', `Cannot resolve a rotated name for ${this.basePath}`, error);
    }

    const previous = this.handle;
    this.handle = null;
    if (previous) {
      try {
        await previous.close();
      } catch (error) {
        // The rename below still moves the data; only the descriptor is lost.
        this.logger.warn('log_file_close_failed', { error: errorMessage(error) });
      }
    }

    try {
      await rename(this.basePath, target);
    } catch (error) {
      throw this.fail('rename', `Failed to rename ${this.basePath} to ${target}`, error);
    }

    try {
      this.handle = await open(this.basePath, 'a', LOG_FILE_MODE);
    } catch (error) {
      throw this.fail('reopen', `Failed to reopen ${this.basePath} after rollover`, error);
    }

    const due = this.nextRolloverAt;
    this.nextRolloverAt = this.scheduleNext(toSeconds(now));
    this.logger.info('log_file_rolled_over', {
      rotatedTo: target,
      dueAt: due,
      rolloverAt: this.nextRolloverAt,
    });
  }

  private scheduleNext(nowSeconds: number): number {
    if (this.schedule === 'lazy') {
      return nowSeconds + this.intervalSeconds;
    }
    const missed = Math.floor((nowSeconds - this.nextRolloverAt) / this.intervalSeconds) + 1;
    return this.nextRolloverAt + missed * this.intervalSeconds;
  }

  /**
   * `basePath + suffix`, with `.1`, `.2`, ... appended when a file from an
   * earlier rollover already holds that name.
   */
  private async rotatedPath(now: Date): Promise<string> {
    const base = this.basePath + formatSuffix(now, this.granularity);
    let candidate = base;
    for (let n = 1; await pathExists(candidate); n++) {
      candidate = `${base}.${n}`;
    }
    return candidate;
  }

  private fail(stage: RolloverError['stage'], message: string, cause: unknown): RolloverError {
    this.failure = new RolloverError(message, this.basePath, stage, cause);
    this.logger.fatal('log_rollover_failed', cause, { stage });
    return this.failure;
  }
}
