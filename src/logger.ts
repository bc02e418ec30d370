import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

import { resolveLogLevel } from './config';

const SERVICE_NAME = 'ron-node-migrate';

/**
 * Creates the package logger.
 *
 * Records go to stderr; stdout is reserved for the progress lines. On an
 * interactive terminal outside production they are pretty-printed.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const nodeEnv = env.NODE_ENV ?? 'development';
  const options: LoggerOptions = {
    level: resolveLogLevel(env),
    base: { env: nodeEnv, service: SERVICE_NAME },
    formatters: {
      level: label => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  const pretty =
    process.stderr.isTTY === true &&
    nodeEnv !== 'production' &&
    nodeEnv !== 'test';

  if (pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2
        }
      }
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(
  bindings: Record<string, unknown>,
  parent: Logger = logger
): Logger {
  return parent.child(bindings);
}
