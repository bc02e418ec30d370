export { processFile } from './process-file';
export { isMigratableEntry, processDirectory } from './process-directory';
