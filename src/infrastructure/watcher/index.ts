export { FileWatchSource, bytesToKB } from './file-watch-source.js';
export type { FileEventHandler } from './file-watch-source.js';
