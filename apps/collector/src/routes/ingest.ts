import express, { Router, type ErrorRequestHandler } from 'express';
import { QueueClosedError } from '@logsink/shared';
import type { WorkerPool } from '@logsink/pipeline';
import type { IngestMode } from '../config.js';
import { serviceUnavailable } from '../middleware/error-handler.js';

export interface IngestRouterOptions {
  pool: WorkerPool;
  mode: IngestMode;
  bodyLimit: string;
}

/** Failure raised by the raw body parser (oversized, aborted, bad encoding). */
function isBodyReadError(err: unknown): err is Error & { type: string } {
  return err instanceof Error && 'type' in err && typeof err.type === 'string';
}

/**
 * POST / — submit one record. The request body, whatever its content type,
 * is queued as-is.
 *
 * The response only acknowledges that the collector took the request: a
 * record may still be dropped (full queue in `drop` mode, unreadable body)
 * or fail to be written. Callers get no delivery guarantee.
 */
export function createIngestRouter({ pool, mode, bodyLimit }: IngestRouterOptions): Router {
  const router = Router();

  router.post('/', express.raw({ type: () => true, limit: bodyLimit }), async (req, res, next) => {
    const payload: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

    try {
      if (mode === 'drop') {
        if (!pool.trySubmit(payload)) {
          pool.context.recordDropped();
          req.log.warn('ingest_queue_full', { bytes: payload.byteLength, queued: pool.queue.size });
        }
      } else {
        await pool.submit(payload);
      }
      res.json({ status: 'ok' });
    } catch (error) {
      if (error instanceof QueueClosedError) {
        next(serviceUnavailable('Collector is shutting down', 'SHUTTING_DOWN'));
        return;
      }
      next(error);
    }
  });

  const acknowledgeUnreadableBody: ErrorRequestHandler = (err, req, res, next) => {
    if (!isBodyReadError(err)) {
      next(err);
      return;
    }
    req.log.warn('ingest_body_unreadable', { reason: err.type, message: err.message });
    res.json({ status: 'ok' });
  };
  router.use(acknowledgeUnreadableBody);

  return router;
}
