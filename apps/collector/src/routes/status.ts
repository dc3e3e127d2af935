import { Router } from 'express';
import { formatDuration } from '@logsink/shared';
import type { WorkerPool } from '@logsink/pipeline';
import type { RotatingFileWriter } from '@logsink/rotating-file';

/** The parts of the writer the status report reads. */
export type RotationInfo = Pick<RotatingFileWriter, 'basePath' | 'granularity' | 'intervalSeconds' | 'rolloverAt'>;

export interface StatusRouterOptions {
  pool: WorkerPool;
  rotation: RotationInfo;
  address: string;
}

/**
 * GET / — counters and configuration for the running collector. Read-only.
 */
export function createStatusRouter({ pool, rotation, address }: StatusRouterOptions): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const stats = pool.context.snapshot();

    res.json({
      logPath: rotation.basePath,
      address,
      startTime: stats.startedAt.toISOString(),
      duration: formatDuration(stats.uptimeMs),
      uptimeMs: stats.uptimeMs,
      handled: stats.handled,
      failed: stats.failed,
      dropped: stats.dropped,
      queued: pool.queue.size,
      workers: pool.size,
      granularity: rotation.granularity,
      interval: rotation.intervalSeconds,
      nextRollover: new Date(rotation.rolloverAt * 1000).toISOString(),
    });
  });

  return router;
}
