/**
 * Result Type Module
 *
 * A discriminated union for operations that can fail without throwing.
 *
 * @module @tripwire/shared/types/result
 */

/**
 * Successful result.
 */
export interface OkResult<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failed result.
 */
export interface ErrResult<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Either a value or an error.
 *
 * @example
 * ```typescript
 * const result = loadConfig({ file: "tripwire.yml" });
 * if (result.ok) {
 *   console.log(result.value.config.commands.length);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export function Ok<T>(value: T): OkResult<T> {
  return { ok: true, value };
}

export function Err<E>(error: E): ErrResult<E> {
  return { ok: false, error };
}
