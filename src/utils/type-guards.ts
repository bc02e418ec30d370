export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  string: string;
  undefined: undefined;
};

/**
 * Creates a guard for a built-in primitive `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The primitive type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/**
 * Shape of the errors raised by Node's `fs` module (`ENOENT`, `EACCES`, ...).
 */
export type NodeSystemError = Error & {
  code?: string;
  errno?: number;
  syscall?: string;
  path?: string;
};

/**
 * Guard verifying the value is an `Error` carrying a string `code`, as system
 * errors from `fs` do.
 *
 * @param value
 *   Candidate runtime value, typically a caught error.
 * @returns
 *   `true` iff {@link value} is an `Error` whose `code` is a string.
 */
export function isNodeError(value: unknown): value is NodeSystemError {
  return value instanceof Error && 'code' in value && isString(value.code);
}
