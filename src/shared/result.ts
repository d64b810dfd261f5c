/**
 * Result<T, E> — explicit success/failure values for adapter operations.
 *
 * Admin mutations and lifecycle callbacks never throw. They return a Result,
 * and the first failure in a fan-out short-circuits the rest of the chain.
 */

/** Discriminated union -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

/** Successful Result. */
export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

/** Failed Result. */
export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/** Shared `ok(undefined)` for operations that only signal completion. */
export const OK_VOID: Result<void, never> = ok(undefined);

/** Transform the success value, leaving failures untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}

/** Chain a fallible step on the success value; short-circuits on failure. */
export function andThen<T, U, E>(
	result: Result<T, E>,
	fn: (value: T) => Result<U, E>,
): Result<U, E> {
	return result.ok ? fn(result.value) : result;
}

/**
 * Run checks in order and return the first failure, or `OK_VOID` when all pass.
 * Checks after the first failure are not evaluated.
 */
export function firstFailure<E>(
	...checks: ReadonlyArray<() => Result<unknown, E>>
): Result<void, E> {
	for (const check of checks) {
		const r = check();
		if (!r.ok) return r;
	}
	return OK_VOID;
}

/** Extract the value or throw the error. Boundary code only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/** Type guard: narrows to the success variant. */
export function isOk<T, E>(
	result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

/** Type guard: narrows to the failure variant. */
export function isErr<T, E>(
	result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}

/** Call `fn`, capturing anything it throws as an `Error`. */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
	try {
		return ok(fn());
	} catch (e) {
		return err(e instanceof Error ? e : new Error(String(e)));
	}
}
