export * from './constants.js';
export * from './errors.js';
export * from './utils/logger.js';
export * from './utils/env.js';
export * from './utils/format.js';
export * from './testing/index.js';
