import type { Logger } from 'pino';

/**
 * Outcome of rewriting a single file.
 */
export type FileResult = {
  /** Base name shared by the input and the output file. */
  fileName: string;
  inputPath: string;
  outputPath: string;
  /** Number of node fragments rewritten in this file. */
  fragmentCount: number;
};

/**
 * Outcome of a full directory pass.
 */
export type BatchResult = {
  inputDir: string;
  outputDir: string;
  /** Files in the order they were processed. */
  files: readonly FileResult[];
};

/**
 * Receives user-facing progress while a batch runs.
 */
export interface ProgressReporter {
  fileTransformed(fileName: string): void;
  completed(result: BatchResult): void;
}

export type ProcessFileOptions = {
  /**
   * Logger for diagnostics. Defaults to the package logger.
   */
  logger?: Logger;
};

export type ProcessDirectoryOptions = ProcessFileOptions & {
  /**
   * File name suffix selecting the entries to rewrite.
   * @default '.ron'
   */
  extension?: string;

  /**
   * Receives one notification per rewritten file.
   * The batch itself never calls `completed`; that is left to the caller.
   */
  reporter?: Pick<ProgressReporter, 'fileTransformed'>;
};
