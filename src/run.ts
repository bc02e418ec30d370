import type { Logger } from 'pino';

import { processDirectory } from './batch';
import { resolveConfig } from './config';
import type { MigrationConfigInput } from './config';
import { logger as defaultLogger } from './logger';
import { createConsoleReporter } from './report';
import type { ProgressReporter } from './types';

export type RunOptions = {
  /**
   * Overrides for the directory layout. The command line passes none.
   */
  config?: MigrationConfigInput;
  reporter?: ProgressReporter;
  logger?: Logger;
};

/**
 * Runs one migration pass and maps its outcome to an exit code.
 *
 * Failures are logged, not rethrown: `0` on success, `1` otherwise. Nothing is
 * reported as complete when the batch aborts.
 */
export async function run(options: RunOptions = {}): Promise<number> {
  const reporter = options.reporter ?? createConsoleReporter();
  const log = options.logger ?? defaultLogger;

  try {
    const config = resolveConfig(options.config);
    const result = await processDirectory(config.inputDir, config.outputDir, {
      extension: config.extension,
      logger: log,
      reporter
    });

    reporter.completed(result);
    log.debug({ fileCount: result.files.length }, 'batch finished');
    return 0;
  } catch (error) {
    log.error({ err: error }, 'migration failed');
    return 1;
  }
}
