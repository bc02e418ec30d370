import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { FileReadError, FileWriteError } from '../errors';
import { createChildLogger } from '../logger';
import { rewriteDocument } from '../rewriter';
import type { FileResult, ProcessFileOptions } from '../types';

/**
 * Rewrites one file from the old node shape to the new one.
 *
 * The whole file is read as UTF-8, rewritten, and written to `outputPath`,
 * replacing any existing file. A failed write may leave `outputPath` empty or
 * truncated.
 *
 * @throws FileReadError when `inputPath` cannot be read.
 * @throws FileWriteError when `outputPath` cannot be written.
 */
export async function processFile(
  inputPath: string,
  outputPath: string,
  options: ProcessFileOptions = {}
): Promise<FileResult> {
  const fileName = path.basename(inputPath);
  const log = createChildLogger({ file: fileName }, options.logger);

  let source: string;
  try {
    source = await readFile(inputPath, 'utf8');
  } catch (error) {
    throw new FileReadError(inputPath, error);
  }

  const { output, fragments } = rewriteDocument(source);

  if (fragments.length === 0) {
    log.warn({ inputPath }, 'no node fragments found; copying unchanged');
  } else {
    log.debug({ fragmentCount: fragments.length }, 'rewrote node fragments');
  }

  try {
    await writeFile(outputPath, output, 'utf8');
  } catch (error) {
    throw new FileWriteError(outputPath, error);
  }

  return {
    fileName,
    inputPath,
    outputPath,
    fragmentCount: fragments.length
  };
}
