import { isNodeError } from './utils/type-guards';

/**
 * Base error for everything the migration raises.
 */
export class MigrationError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options: { cause?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.context = options.context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when a migration configuration fails validation.
 */
export class ConfigError extends MigrationError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(
      `Invalid migration config:\n${issues.map(issue => `  - ${issue}`).join('\n')}`,
      'CONFIG_INVALID',
      { context: { issues } }
    );
    this.issues = issues;
  }
}

export type IOOperation = 'read' | 'write' | 'list' | 'mkdir';

const OPERATION_LABELS: Record<IOOperation, string> = {
  read: 'read file',
  write: 'write file',
  list: 'list directory',
  mkdir: 'create directory'
};

/**
 * A filesystem failure.
 *
 * `code` carries the system error code (`ENOENT`, `EACCES`, `ENOTDIR`, ...),
 * or `EIO` when the underlying error has none.
 */
export class MigrationIOError extends MigrationError {
  public readonly operation: IOOperation;
  public readonly path: string;

  constructor(operation: IOOperation, path: string, cause: unknown) {
    const code = isNodeError(cause) && cause.code ? cause.code : 'EIO';
    const reason = cause instanceof Error ? cause.message : String(cause);

    super(`Cannot ${OPERATION_LABELS[operation]} "${path}": ${reason}`, code, {
      cause,
      context: { operation, path }
    });
    this.operation = operation;
    this.path = path;
  }
}

export class FileReadError extends MigrationIOError {
  constructor(path: string, cause: unknown) {
    super('read', path, cause);
  }
}

export class FileWriteError extends MigrationIOError {
  constructor(path: string, cause: unknown) {
    super('write', path, cause);
  }
}

export class DirectoryReadError extends MigrationIOError {
  constructor(path: string, cause: unknown) {
    super('list', path, cause);
  }
}

export class DirectoryCreateError extends MigrationIOError {
  constructor(path: string, cause: unknown) {
    super('mkdir', path, cause);
  }
}
