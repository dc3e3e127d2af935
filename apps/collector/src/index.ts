export { loadConfig, parseAddress, type CollectorConfig, type IngestMode, type ListenAddress } from './config.js';
export { createApp, type AppDependencies } from './server.js';
export { startCollector, type Collector, type StartCollectorOptions } from './collector.js';
