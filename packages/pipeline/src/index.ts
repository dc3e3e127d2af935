export { WorkQueue, type DequeueResult } from './queue.js';
export { WorkerPool, type WorkerPoolOptions } from './pool.js';
export { PipelineContext, type PipelineStats } from './context.js';
