/**
 * Create a version of `func` that runs at most once per `interval`
 * milliseconds. The first call always runs; calls inside the interval are
 * dropped, not deferred.
 *
 * @example
 * ```ts
 * const log = throttle((msg: string) => console.log(msg), 1_000)
 * for (let i = 0; i < 1_000; i++) log(`Parsed ${i} blocks`)
 * ```
 */
export function throttle<T extends unknown[]>(
	func: (...args: T) => void,
	interval: number,
) {
	let lastTime = Number.NEGATIVE_INFINITY
	return (...args: T) => {
		const now = Date.now()
		if (now - lastTime < interval) return
		lastTime = now
		func(...args)
	}
}
