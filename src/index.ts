export {
  NODE_FRAGMENT_SOURCE,
  createNodeFragmentPattern,
  findNodeFragments,
  renderNodeFragment,
  rewriteDocument,
  transform
} from './rewriter';
export { isMigratableEntry, processDirectory, processFile } from './batch';
export {
  DEFAULT_EXTENSION,
  DEFAULT_INPUT_DIR,
  DEFAULT_OUTPUT_DIR,
  resolveConfig,
  resolveLogLevel
} from './config';
export type { LogLevel, MigrationConfig, MigrationConfigInput } from './config';
export {
  ConfigError,
  DirectoryCreateError,
  DirectoryReadError,
  FileReadError,
  FileWriteError,
  MigrationError,
  MigrationIOError
} from './errors';
export type { IOOperation } from './errors';
export { createChildLogger, createLogger, logger } from './logger';
export { run } from './run';
export type { RunOptions } from './run';
export { COMPLETION_LINE, createConsoleReporter, formatFileLine } from './report';
export { isNodeError } from './utils/type-guards';
export type * from './types';
