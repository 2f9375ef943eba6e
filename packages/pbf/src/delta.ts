/**
 * Reader for delta coded integer columns, such as `OsmPbfWay.refs` and
 * `OsmPbfRelation.memids`: each value is stored as the difference from the
 * previous one, starting from 0.
 *
 * @example
 * ```ts
 * for (const way of group.ways) {
 *   for (const ref of new DeltaValueReader(way.refs)) {
 *     console.log(ref)
 *   }
 * }
 * ```
 */
export class DeltaValueReader implements IterableIterator<number> {
	#values: ArrayLike<number>
	#index = 0
	#accumulated = 0

	constructor(values: ArrayLike<number>) {
		this.#values = values
	}

	next(): IteratorResult<number> {
		const delta = this.#values[this.#index]
		if (delta === undefined) return { done: true, value: undefined }
		this.#index++
		this.#accumulated += delta
		return { done: false, value: this.#accumulated }
	}

	[Symbol.iterator]() {
		return this
	}
}

/**
 * Decode a whole delta coded column at once.
 */
export function deltaDecode(values: ArrayLike<number>): number[] {
	return Array.from(new DeltaValueReader(values))
}

/**
 * Delta encode a column. The inverse of `deltaDecode`.
 */
export function deltaEncode(values: ArrayLike<number>): number[] {
	const deltas: number[] = []
	let last = 0
	for (let i = 0; i < values.length; i++) {
		const value = values[i] ?? 0
		deltas.push(value - last)
		last = value
	}
	return deltas
}
