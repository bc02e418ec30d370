import { mkdir, readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';

import { DEFAULT_EXTENSION } from '../config';
import { DirectoryCreateError, DirectoryReadError } from '../errors';
import { logger as defaultLogger } from '../logger';
import type {
  BatchResult,
  FileResult,
  ProcessDirectoryOptions
} from '../types';
import { processFile } from './process-file';

/**
 * Returns `true` for directory entries the batch rewrites: regular files whose
 * name ends with `extension`. Directories and symbolic links never qualify,
 * whatever their name.
 */
export function isMigratableEntry(entry: Dirent, extension: string): boolean {
  return entry.isFile() && entry.name.endsWith(extension);
}

/**
 * Rewrites every matching file directly under `inputDir` into `outputDir`.
 *
 * Order of work:
 * 1. `outputDir` is created (with parents) when missing.
 * 2. `inputDir` is listed in the filesystem's own order.
 * 3. Each matching file is processed to the same name under `outputDir`,
 *    one after another, and reported through `options.reporter`.
 *
 * The first failure aborts the batch; files after it are left untouched.
 *
 * @throws DirectoryCreateError when `outputDir` cannot be created.
 * @throws DirectoryReadError when `inputDir` is missing or not a directory.
 * @throws FileReadError | FileWriteError from {@link processFile}.
 */
export async function processDirectory(
  inputDir: string,
  outputDir: string,
  options: ProcessDirectoryOptions = {}
): Promise<BatchResult> {
  const extension = options.extension ?? DEFAULT_EXTENSION;
  const log = options.logger ?? defaultLogger;

  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new DirectoryCreateError(outputDir, error);
  }

  let entries: Dirent[];
  try {
    entries = await readdir(inputDir, { withFileTypes: true });
  } catch (error) {
    throw new DirectoryReadError(inputDir, error);
  }

  log.debug(
    { inputDir, outputDir, extension, entryCount: entries.length },
    'starting batch'
  );

  const files: FileResult[] = [];

  for (const entry of entries) {
    if (!isMigratableEntry(entry, extension)) {
      log.debug({ entry: entry.name }, 'skipping entry');
      continue;
    }

    const result = await processFile(
      path.join(inputDir, entry.name),
      path.join(outputDir, entry.name),
      { logger: log }
    );
    files.push(result);
    options.reporter?.fileTransformed(entry.name);
  }

  return { inputDir, outputDir, files };
}
