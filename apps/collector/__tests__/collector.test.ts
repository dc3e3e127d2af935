import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import request from 'supertest';
import { ConfigError, createMockLogger } from '@logsink/shared';
import type { CollectorConfig } from '../src/config.js';
import { startCollector, type Collector } from '../src/collector.js';

describe('startCollector', () => {
  let dir: string;
  let config: CollectorConfig;
  const started: Collector[] = [];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'logsink-collector-'));
    config = {
      logPath: join(dir, 'nested', 'access.log'),
      address: '127.0.0.1:0',
      workers: 2,
      queueCapacity: undefined,
      granularity: 'hour',
      interval: 1,
      schedule: 'lazy',
      ingestMode: 'block',
      bodyLimit: '1mb',
    };
  });

  afterEach(async () => {
    await Promise.all(started.splice(0).map((collector) => collector.shutdown()));
    await rm(dir, { recursive: true, force: true });
  });

  it('accepts records over HTTP and flushes them to the log file on shutdown', async () => {
    const logger = createMockLogger();
    const collector = await startCollector(config, { logger, onFatal: () => {} });
    started.push(collector);

    expect(collector.address).toMatch(/^127\.0\.0\.1:\d+$/);
    expect(collector.pool.queue.capacity).toBe(2);

    for (const id of ['a', 'b', 'c']) {
      await request(collector.server).post('/logs').send(`{"id":"${id}"}`).expect(200, { status: 'ok' });
    }
    await collector.shutdown();

    const lines = (await readFile(config.logPath, 'utf8')).split('\n').filter(Boolean);
    expect(lines.sort()).toEqual(['{"id":"a"}', '{"id":"b"}', '{"id":"c"}']);
    expect(collector.writer.closed).toBe(true);
    expect(collector.server.listening).toBe(false);
    expect(logger.hasLog('info', 'collector_started')).toBe(true);
  });

  it('uses the configured queue capacity', async () => {
    const collector = await startCollector(
      { ...config, queueCapacity: 7 },
      { logger: createMockLogger(), onFatal: () => {} },
    );
    started.push(collector);

    expect(collector.pool.queue.capacity).toBe(7);
  });

  it('shuts down only once when asked twice', async () => {
    const collector = await startCollector(config, { logger: createMockLogger(), onFatal: () => {} });

    await Promise.all([collector.shutdown(), collector.shutdown()]);

    expect(collector.writer.closed).toBe(true);
  });

  it('rejects an invalid address before touching the filesystem', async () => {
    await expect(
      startCollector({ ...config, address: 'nowhere' }, { logger: createMockLogger(), onFatal: () => {} }),
    ).rejects.toBeInstanceOf(ConfigError);

    await expect(readFile(config.logPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('releases the pool and the log file when the port is taken', async () => {
    const first = await startCollector(config, { logger: createMockLogger(), onFatal: () => {} });
    started.push(first);

    const logger = createMockLogger();
    await expect(
      startCollector(
        { ...config, address: first.address, logPath: join(dir, 'second.log') },
        { logger, onFatal: () => {} },
      ),
    ).rejects.toMatchObject({ code: 'EADDRINUSE' });

    expect(logger.hasLog('error', 'collector_listen_failed')).toBe(true);
    expect(logger.hasLog('info', 'worker_pool_stopped')).toBe(true);
  });
});
