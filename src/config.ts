import path from 'node:path';
import { z } from 'zod';

import { ConfigError } from './errors';

/**
 * Directory layout used when no override is given. Relative paths resolve
 * against the working directory.
 */
export const DEFAULT_INPUT_DIR = 'animation_graphs_old';
export const DEFAULT_OUTPUT_DIR = 'animation_graphs';
export const DEFAULT_EXTENSION = '.ron';

const MigrationConfigSchema = z
  .object({
    inputDir: z.string().min(1, 'must not be empty').default(DEFAULT_INPUT_DIR),
    outputDir: z
      .string()
      .min(1, 'must not be empty')
      .default(DEFAULT_OUTPUT_DIR),
    extension: z
      .string()
      .regex(/^\.[^/\\]+$/, 'must be a file suffix starting with "."')
      .default(DEFAULT_EXTENSION)
  })
  .strict()
  .refine(
    config => path.resolve(config.inputDir) !== path.resolve(config.outputDir),
    { message: 'must differ from inputDir', path: ['outputDir'] }
  );

export type MigrationConfig = z.output<typeof MigrationConfigSchema>;

export type MigrationConfigInput = z.input<typeof MigrationConfigSchema>;

const LogLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${key}: ${issue.message}`;
}

/**
 * Validates a migration config, filling unset fields with the defaults.
 *
 * @throws ConfigError listing every issue as `field: message`.
 */
export function resolveConfig(
  overrides: MigrationConfigInput = {}
): MigrationConfig {
  const result = MigrationConfigSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(formatIssue));
  }
  return result.data;
}

/**
 * Reads the log level from `LOG_LEVEL`.
 *
 * Unset means `info`, or `silent` under `NODE_ENV=test`.
 *
 * @throws ConfigError when `LOG_LEVEL` names no pino level.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.LOG_LEVEL;
  if (!raw) return env.NODE_ENV === 'test' ? 'silent' : 'info';

  const result = LogLevelSchema.safeParse(raw.toLowerCase());
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `LOG_LEVEL: ${issue.message}`)
    );
  }
  return result.data;
}
