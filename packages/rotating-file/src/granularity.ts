import { format } from 'date-fns';
import { ConfigError } from '@logsink/shared';

export const GRANULARITIES = {
  second: { seconds: 1, suffixFormat: 'yyyy-MM-dd_HH-mm-ss' },
  minute: { seconds: 60, suffixFormat: 'yyyy-MM-dd_HH-mm' },
  hour: { seconds: 3600, suffixFormat: 'yyyy-MM-dd_HH' },
  day: { seconds: 86_400, suffixFormat: 'yyyy-MM-dd' },
} as const;

export type Granularity = keyof typeof GRANULARITIES;

export const GRANULARITY_NAMES: readonly Granularity[] = ['second', 'minute', 'hour', 'day'];

export function isGranularity(value: string): value is Granularity {
  return Object.hasOwn(GRANULARITIES, value);
}

export function parseGranularity(value: string): Granularity {
  if (!isGranularity(value)) {
    throw new ConfigError(
      `Invalid rotation granularity "${value}" (expected one of: ${GRANULARITY_NAMES.join(', ')})`,
      'granularity',
    );
  }
  return value;
}

/**
 * Rollover period in seconds for `multiplier` units of `granularity`.
 */
export function intervalSeconds(granularity: Granularity, multiplier: number): number {
  if (!Number.isInteger(multiplier) || multiplier < 1) {
    throw new ConfigError(
      `Invalid rotation interval multiplier ${multiplier} (expected a positive integer)`,
      'multiplier',
    );
  }
  return GRANULARITIES[granularity].seconds * multiplier;
}

/**
 * Local-time suffix appended to the base path of a rolled-over file.
 */
export function formatSuffix(date: Date, granularity: Granularity): string {
  return format(date, GRANULARITIES[granularity].suffixFormat);
}
