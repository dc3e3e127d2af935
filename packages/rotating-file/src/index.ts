export {
  RotatingFileWriter,
  type LogSink,
  type Payload,
  type RolloverSchedule,
  type RotatingFileWriterOptions,
} from './writer.js';
export {
  GRANULARITIES,
  GRANULARITY_NAMES,
  formatSuffix,
  intervalSeconds,
  isGranularity,
  parseGranularity,
  type Granularity,
} from './granularity.js';
export { Mutex } from './lock.js';
