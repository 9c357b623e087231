export { LogFileSink } from './log-file-sink.js';
export type { EventSink } from './log-file-sink.js';
