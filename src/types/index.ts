export type { NodeFragment, RewriteResult } from './fragment';
export type {
  BatchResult,
  FileResult,
  ProcessDirectoryOptions,
  ProcessFileOptions,
  ProgressReporter
} from './batch';
