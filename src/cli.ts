#!/usr/bin/env node
import { logger } from './logger';
import { run } from './run';

run().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal({ err: error }, 'unexpected failure');
    process.exitCode = 1;
  }
);
