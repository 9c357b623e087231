export { fileEventWireSchema, toWire, encodeFileEvent, decodeFileEvent } from './event-schema.js';
export type { DecodeResult, FileEventWire } from './event-schema.js';
export { formatLogLine, formatLogTimestamp } from './log-line.js';
