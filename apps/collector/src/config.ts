import { Command } from 'commander';
import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_ADDRESS,
  DEFAULT_BODY_LIMIT,
  DEFAULT_LOG_PATH,
  DEFAULT_WORKER_COUNT,
  readEnv,
} from '@logsink/shared';

const configSchema = z.object({
  logPath: z.string().min(1),
  address: z.string().min(1),
  workers: z.coerce.number().int().positive(),
  queueCapacity: z.coerce.number().int().nonnegative().optional(),
  granularity: z.enum(['second', 'minute', 'hour', 'day']),
  interval: z.coerce.number().int().positive(),
  schedule: z.enum(['lazy', 'aligned']),
  ingestMode: z.enum(['block', 'drop']),
  bodyLimit: z.string().min(1),
});

export type CollectorConfig = z.infer<typeof configSchema>;

export type IngestMode = CollectorConfig['ingestMode'];

export interface ListenAddress {
  host: string;
  port: number;
}

type CliOptions = {
  logPath?: string;
  address?: string;
  workers?: string;
  queueCapacity?: string;
  granularity?: string;
  interval?: string;
  schedule?: string;
  ingestMode?: string;
  bodyLimit?: string;
};

function createProgram(): Command {
  return new Command()
    .name('logsink')
    .description('Collect log records over HTTP and append them to a time-rotated file')
    .option('--log-path <path>', `active log file (env LOG_PATH, default ${DEFAULT_LOG_PATH})`)
    .option('--address <host:port>', `listen address (env ADDRESS, default ${DEFAULT_ADDRESS})`)
    .option('--workers <n>', `writer workers (env WORKER_NUM, default ${DEFAULT_WORKER_COUNT})`)
    .option('--queue-capacity <n>', 'queued records before ingress backpressure (env QUEUE_CAPACITY, default: workers)')
    .option('--granularity <unit>', 'rotation unit: second, minute, hour or day (env ROTATE_WHEN, default hour)')
    .option('--interval <n>', 'rotate every n units (env ROTATE_INTERVAL, default 1)')
    .option('--schedule <mode>', 'rollover after idle gaps: lazy or aligned (env ROTATE_SCHEDULE, default lazy)')
    .option('--ingest-mode <mode>', 'full queue: block the request or drop the record (env INGEST_MODE, default block)')
    .option('--body-limit <size>', `largest accepted request body (env BODY_LIMIT, default ${DEFAULT_BODY_LIMIT})`)
    .exitOverride()
    .showHelpAfterError();
}

/**
 * Resolve the collector configuration. Flags win over environment
 * variables, which win over defaults.
 *
 * @param argv full process argv (node binary and script path included)
 * @throws ConfigError when a value fails validation
 * @throws CommanderError for unknown flags or `--help`
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): CollectorConfig {
  const program = createProgram();
  program.parse(argv);
  const flags = program.opts<CliOptions>();

  const fromEnv = (name: string) => readEnv(name, env);

  const result = configSchema.safeParse({
    logPath: flags.logPath ?? fromEnv('LOG_PATH') ?? DEFAULT_LOG_PATH,
    address: flags.address ?? fromEnv('ADDRESS') ?? DEFAULT_ADDRESS,
    workers: flags.workers ?? fromEnv('WORKER_NUM') ?? DEFAULT_WORKER_COUNT,
    queueCapacity: flags.queueCapacity ?? fromEnv('QUEUE_CAPACITY'),
    granularity: flags.granularity ?? fromEnv('ROTATE_WHEN') ?? 'hour',
    interval: flags.interval ?? fromEnv('ROTATE_INTERVAL') ?? 1,
    schedule: flags.schedule ?? fromEnv('ROTATE_SCHEDULE') ?? 'lazy',
    ingestMode: flags.ingestMode ?? fromEnv('INGEST_MODE') ?? 'block',
    bodyLimit: flags.bodyLimit ?? fromEnv('BODY_LIMIT') ?? DEFAULT_BODY_LIMIT,
  });

  if (!result.success) {
    const issues = result.error.issues;
    const details = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration (${details})`, issues[0]?.path.join('.'));
  }

  parseAddress(result.data.address);
  return result.data;
}

/**
 * Split `host:port`, `[v6]:port` or `:port` (all interfaces).
 */
export function parseAddress(address: string): ListenAddress {
  const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d+)$/.exec(address);
  if (!match) {
    throw new ConfigError(`Invalid listen address "${address}" (expected host:port)`, 'address');
  }

  const port = Number(match[3]);
  if (port > 65_535) {
    throw new ConfigError(`Invalid listen port ${port} in "${address}"`, 'address');
  }

  const host = match[1] ?? match[2] ?? '';
  return { host: host === '' ? '0.0.0.0' : host, port };
}
