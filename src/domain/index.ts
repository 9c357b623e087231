export type { FileEvent, FileOperation } from './file-event.js';
export { FILE_OPERATIONS, InvalidFileEventError, fileAdded, fileDeleted, unixNow } from './file-event.js';
