/**
 * Result values for failures that are scoped to a single item.
 *
 * Readers that must keep iterating past a bad item (one dense node, one side
 * of a tag pair) yield a `Result` instead of throwing.
 *
 * @module
 */

/** A successfully produced value. */
export interface Ok<T> {
	ok: true
	value: T
}

/** A failure, carrying the error that caused it. */
export interface Err<E> {
	ok: false
	error: E
}

export type Result<T, E = Error> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
	return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
	return { ok: false, error }
}

/**
 * Return the value of a successful result, or throw its error.
 *
 * @example
 * ```ts
 * for (const result of new DenseNodeReader(dense)) {
 *   const node = unwrap(result) // throws the node's LogicError
 * }
 * ```
 */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value
	throw result.error
}

/** Return the value of a successful result, or `fallback` on failure. */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
	return result.ok ? result.value : fallback
}
