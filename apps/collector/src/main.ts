// Only load dotenv in development - production uses container env vars
if (process.env.NODE_ENV !== 'production') {
  const { config } = await import('dotenv');
  const { fileURLToPath } = await import('node:url');
  const { dirname, resolve } = await import('node:path');

  const __dirname = dirname(fileURLToPath(import.meta.url));
  const rootDir = resolve(__dirname, '../../..');

  config({ path: resolve(rootDir, '.env.local') });
  config({ path: resolve(rootDir, '.env') });
}

import { CommanderError } from 'commander';
import { SHUTDOWN_TIMEOUT_MS, createServiceLogger, generateTraceId } from '@logsink/shared';
import { loadConfig, type CollectorConfig } from './config.js';
import { startCollector, type Collector } from './collector.js';

const logger = createServiceLogger('collector', { component: 'main' });

function readConfig(): CollectorConfig {
  try {
    return loadConfig(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help, --version and unknown flags have already been printed
      process.exit(error.exitCode);
    }
    logger.fatal('config_invalid', error);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = readConfig();

  let collector: Collector | null = null;
  let shuttingDown = false;

  const shutdown = async (reason: string, exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    const traceId = generateTraceId();
    logger.info('collector_shutdown_initiated', { traceId, reason });

    setTimeout(() => {
      logger.warn('collector_shutdown_forced', {
        traceId,
        reason: `Shutdown timeout exceeded ${SHUTDOWN_TIMEOUT_MS}ms`,
      });
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    try {
      await collector?.shutdown();
      logger.info('collector_shutdown_complete', { traceId });
      process.exit(exitCode);
    } catch (error) {
      logger.error('collector_shutdown_error', error, { traceId });
      process.exit(1);
    }
  };

  collector = await startCollector(config, {
    logger,
    onFatal: () => {
      void shutdown('fatal_error', 1);
    },
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM', 0);
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT', 0);
  });
}

main().catch((error: unknown) => {
  logger.fatal('collector_start_failed', error);
  process.exit(1);
});
