export * from './broker/index.js';
export { LogFileSink } from './sink/index.js';
export type { EventSink } from './sink/index.js';
export { FileWatchSource, bytesToKB } from './watcher/index.js';
export type { FileEventHandler } from './watcher/index.js';
export { PullConsumerLoop, PublishWorker } from './worker/index.js';
export type {
  ConsumerHealth,
  ConsumerLoopOptions,
  ConsumerLoopState,
  ConsumerStats,
  PublishStats,
  PublishWorkerOptions,
} from './worker/index.js';
export { sleep, waitForAbort } from './timers.js';
