export const DEFAULT_LOG_PATH = '/var/log/logsink/access.log';
export const DEFAULT_ADDRESS = '127.0.0.1:9513';
export const DEFAULT_WORKER_COUNT = 2;
export const DEFAULT_BODY_LIMIT = '10mb';

/** Mode for the directory created above the active log file */
export const LOG_DIR_MODE = 0o777;
/** Mode for newly created log files (before umask) */
export const LOG_FILE_MODE = 0o666;

/** Time allowed for in-flight requests and queued records to drain on shutdown */
export const SHUTDOWN_TIMEOUT_MS = 10_000;

export const ROUTES = {
  INGEST: '/logs',
  STATS: '/logs/stats',
  HEALTH: '/health',
} as const;
