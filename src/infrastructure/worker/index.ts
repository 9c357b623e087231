export { PullConsumerLoop } from './consumer-loop.js';
export type { ConsumerHealth, ConsumerLoopOptions, ConsumerLoopState, ConsumerStats } from './consumer-loop.js';
export { PublishWorker } from './publish-worker.js';
export type { PublishStats, PublishWorkerOptions } from './publish-worker.js';
