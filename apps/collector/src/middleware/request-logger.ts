import type { RequestHandler } from 'express';
import { generateTraceId, type Logger } from '@logsink/shared';

/**
 * Attach a request-scoped child logger and log completion with status and
 * duration. Ingress traffic logs at debug level to keep high-volume record
 * submissions out of the info stream.
 */
export function requestLogger(logger: Logger, quietPaths: readonly string[] = []): RequestHandler {
  return (req, res, next) => {
    const requestId = generateTraceId();
    const startTime = Date.now();
    const quiet = quietPaths.includes(req.path);

    req.requestId = requestId;
    req.log = logger.child({
      requestId,
      method: req.method,
      path: req.path,
    });

    res.on('finish', () => {
      const data = { statusCode: res.statusCode, durationMs: Date.now() - startTime };
      if (quiet) {
        req.log.debug('Request completed', data);
      } else {
        req.log.info('Request completed', data);
      }
    });

    next();
  };
}
