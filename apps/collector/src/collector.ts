import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type express from 'express';
import { errorMessage, type Logger } from '@logsink/shared';
import { PipelineContext, WorkerPool } from '@logsink/pipeline';
import { RotatingFileWriter } from '@logsink/rotating-file';
import { parseAddress, type CollectorConfig } from './config.js';
import { createApp } from './server.js';

export interface StartCollectorOptions {
  logger: Logger;
  /** Invoked once when the pipeline hits an unrecoverable write error */
  onFatal: (error: Error) => void;
  /** Time source for rollover checks and uptime */
  clock?: () => Date;
}

export interface Collector {
  readonly app: express.Application;
  readonly server: Server;
  readonly pool: WorkerPool;
  readonly writer: RotatingFileWriter;
  /** Address the server actually bound, e.g. `127.0.0.1:9513` */
  readonly address: string;
  /**
   * Stop accepting connections, close the queue, wait for the workers to
   * drain it, then close the log file.
   */
  shutdown(): Promise<void>;
}

function listen(app: express.Application, host: string, port: number): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

function formatBound(info: AddressInfo | string | null, fallback: string): string {
  if (!info || typeof info === 'string') return fallback;
  return info.family === 'IPv6' ? `[${info.address}]:${info.port}` : `${info.address}:${info.port}`;
}

/**
 * Open the log file, start the worker pool and bind the HTTP server.
 *
 * @throws ConfigError for an invalid address, granularity or worker count
 * @throws IOError when the log file cannot be opened
 */
export async function startCollector(
  config: CollectorConfig,
  { logger, onFatal, clock }: StartCollectorOptions,
): Promise<Collector> {
  const { host, port } = parseAddress(config.address);

  const writer = await RotatingFileWriter.open(config.logPath, config.granularity, config.interval, {
    schedule: config.schedule,
    logger,
    clock,
  });

  let pool: WorkerPool;
  try {
    pool = new WorkerPool({
      sink: writer,
      size: config.workers,
      capacity: config.queueCapacity,
      context: new PipelineContext(clock),
      logger,
      onFatal,
    });
  } catch (error) {
    await writer.close();
    throw error;
  }
  pool.start();

  const app = createApp({ pool, rotation: writer, config, logger: logger.child({ component: 'http' }) });

  let server: Server;
  try {
    server = await listen(app, host, port);
  } catch (error) {
    logger.error('collector_listen_failed', error, { address: config.address });
    await pool.stop();
    await writer.close();
    throw error;
  }

  const address = formatBound(server.address(), config.address);
  logger.info('collector_started', {
    address,
    logPath: writer.basePath,
    workers: pool.size,
    capacity: pool.queue.capacity,
    granularity: writer.granularity,
    intervalSeconds: writer.intervalSeconds,
    ingestMode: config.ingestMode,
  });

  let stopping: Promise<void> | null = null;

  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      const closing = closeServer(server);
      await pool.stop();
      await writer.close();
      try {
        await closing;
      } catch (error) {
        logger.warn('collector_server_close_failed', { error: errorMessage(error) });
      }
    })();
    return stopping;
  };

  return { app, server, pool, writer, address, shutdown };
}
