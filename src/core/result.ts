/**
 * @fileoverview Result type for explicit error handling
 *
 * Used where a parse failure is an expected outcome the caller branches on
 * (stored JSON columns, dataset lines, --metadata values).
 */

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });
