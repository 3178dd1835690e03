/**
 * @fileoverview Result Type
 *
 * Explicit success/failure values returned by services instead of thrown errors.
 */

export type Result<T, E> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });
