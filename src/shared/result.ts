/**
 * Result<T, E> — explicit success/failure values for venue and engine calls.
 *
 * Engine code never throws across a step boundary: every call to the venue,
 * every sizing computation and every campaign step hands back a Result that
 * the caller branches on with `if (!r.ok)`. Thrown values are caught where
 * they arise, in the HTTP transport and at the root of each background task.
 */

/** `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}
