import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigError,
  IOError,
  QueueClosedError,
  RolloverError,
  createMockLogger,
} from '@logsink/shared';
import { RotatingFileWriter, type LogSink, type Payload } from '@logsink/rotating-file';
import { PipelineContext } from '../src/context.js';
import { WorkerPool } from '../src/pool.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

/** In-memory sink that yields to the event loop on every write */
class RecordingSink implements LogSink {
  readonly lines: string[] = [];
  closed = false;

  constructor(private readonly failFor: (line: string) => Error | undefined = () => undefined) {}

  async write(payload: Payload): Promise<number> {
    await tick();
    const line = typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8');
    const error = this.failFor(line);
    if (error) throw error;
    this.lines.push(line);
    return Buffer.byteLength(line) + 1;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe('WorkerPool', () => {
  it('rejects a non-positive worker count', () => {
    const sink = new RecordingSink();

    expect(() => new WorkerPool({ sink, size: 0 })).toThrow(ConfigError);
    expect(() => new WorkerPool({ sink, size: 2.5 })).toThrow(ConfigError);
  });

  it('sizes the queue to the worker count unless told otherwise', () => {
    const sink = new RecordingSink();

    expect(new WorkerPool({ sink, size: 3 }).queue.capacity).toBe(3);
    expect(new WorkerPool({ sink, size: 3, capacity: 10 }).queue.capacity).toBe(10);
  });

  it('keeps a single producer\'s order with one worker', async () => {
    const sink = new RecordingSink();
    const pool = new WorkerPool({ sink, size: 1 });
    pool.start();

    for (let i = 0; i < 10; i++) {
      await pool.submit(`line-${i}`);
    }
    await pool.stop();

    expect(sink.lines).toEqual(Array.from({ length: 10 }, (_, i) => `line-${i}`));
  });

  it('counts every record handled under concurrent load', async () => {
    const sink = new RecordingSink();
    const context = new PipelineContext();
    const pool = new WorkerPool({ sink, size: 4, capacity: 8, context });
    pool.start();

    const payloads = Array.from({ length: 250 }, (_, i) => `record-${i}`);
    await Promise.all(payloads.map((payload) => pool.submit(payload)));
    await pool.stop();

    expect(context.handled).toBe(250);
    expect(context.failed).toBe(0);
    expect([...sink.lines].sort()).toEqual([...payloads].sort());
  });

  it('drains records still queued when stop is called', async () => {
    const sink = new RecordingSink();
    const pool = new WorkerPool({ sink, size: 1, capacity: 5 });

    for (let i = 0; i < 5; i++) {
      expect(pool.trySubmit(`queued-${i}`)).toBe(true);
    }
    pool.start();
    await pool.stop();

    expect(sink.lines).toHaveLength(5);
    expect(pool.running).toBe(false);
  });

  it('refuses submissions after stop', async () => {
    const pool = new WorkerPool({ sink: new RecordingSink(), size: 1 });
    pool.start();
    await pool.stop();

    await expect(pool.submit('late')).rejects.toBeInstanceOf(QueueClosedError);
    expect(() => pool.trySubmit('late')).toThrow(QueueClosedError);
  });

  it('logs and drops a failed append, then keeps going', async () => {
    const sink = new RecordingSink((line) =>
      line === 'bad' ? new IOError('disk full', '/tmp/x.log') : undefined,
    );
    const logger = createMockLogger();
    const pool = new WorkerPool({ sink, size: 1, logger });
    pool.start();

    await pool.submit('good-1');
    await pool.submit('bad');
    await pool.submit('good-2');
    await pool.stop();

    expect(sink.lines).toEqual(['good-1', 'good-2']);
    expect(pool.context.handled).toBe(2);
    expect(pool.context.failed).toBe(1);
    expect(pool.fatal).toBeNull();

    const [failure] = logger.getLogsByLevel('error');
    expect(failure?.message).toBe('log_write_failed');
    expect(failure?.data).toEqual({ component: 'pool', workerId: '0', bytes: 3 });
  });

  it('escalates a rollover failure once and stops accepting records', async () => {
    const rolloverError = new RolloverError('rename failed', '/tmp/x.log', 'rename');
    const sink = new RecordingSink(() => rolloverError);
    const onFatal = vi.fn();
    const logger = createMockLogger();
    const pool = new WorkerPool({ sink, size: 2, onFatal, logger });
    pool.start();

    await pool.submit('one');
    await pool.submit('two');
    await pool.stop();

    expect(onFatal).toHaveBeenCalledTimes(1);
    expect(onFatal).toHaveBeenCalledWith(rolloverError);
    expect(pool.fatal).toBe(rolloverError);
    expect(pool.context.handled).toBe(0);
    expect(logger.getLogsByLevel('fatal').map((log) => log.message)).toEqual(['pipeline_fatal_error']);
    await expect(pool.submit('three')).rejects.toBeInstanceOf(QueueClosedError);
  });

  it('logs a throwing fatal handler instead of crashing the worker', async () => {
    const sink = new RecordingSink(() => new RolloverError('reopen failed', '/tmp/x.log', 'reopen'));
    const logger = createMockLogger();
    const pool = new WorkerPool({
      sink,
      size: 1,
      logger,
      onFatal: () => {
        throw new Error('handler broke');
      },
    });
    pool.start();

    await pool.submit('one');
    await pool.stop();

    expect(logger.hasLog('error', 'fatal_handler_failed')).toBe(true);
  });

  describe('with a rotating file writer', () => {
    let dir: string;
    let writer: RotatingFileWriter;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'logsink-pool-'));
      writer = await RotatingFileWriter.open(join(dir, 'x.log'), 'hour', 1);
    });

    afterEach(async () => {
      if (!writer.closed) await writer.close();
      await rm(dir, { recursive: true, force: true });
    });

    it('writes all five records submitted at once through two workers and a queue of two', async () => {
      const pool = new WorkerPool({ sink: writer, size: 2, capacity: 2 });
      pool.start();

      const payloads = ['p1', 'p2', 'p3', 'p4', 'p5'].map((p) => Buffer.from(`{"id":"${p}"}`));
      await Promise.all(payloads.map((payload) => pool.submit(payload)));
      await pool.stop();

      const lines = (await readFile(join(dir, 'x.log'), 'utf8')).split('\n').filter(Boolean);
      expect(lines.sort()).toEqual([
        '{"id":"p1"}',
        '{"id":"p2"}',
        '{"id":"p3"}',
        '{"id":"p4"}',
        '{"id":"p5"}',
      ]);
      expect(pool.context.handled).toBe(5);
    });

    it('keeps each record on its own intact line with many workers', async () => {
      const pool = new WorkerPool({ sink: writer, size: 8, capacity: 4 });
      pool.start();

      const payloads = Array.from({ length: 400 }, (_, i) => `${i}:${'z'.repeat(i % 97)}`);
      await Promise.all(payloads.map((payload) => pool.submit(payload)));
      await pool.stop();

      const lines = (await readFile(join(dir, 'x.log'), 'utf8')).split('\n');
      expect(lines.pop()).toBe('');
      expect(lines.sort()).toEqual([...payloads].sort());
      expect(pool.context.handled).toBe(400);
    });
  });
});
