/**
 * Tag resolution against a block's string table.
 *
 * Tags are stored as string table indexes, either as parallel `keys`/`vals`
 * columns (nodes, ways, relations) or as an interleaved run (dense nodes).
 * Each side of each pair is resolved on its own, so a bad key does not hide a
 * good value and the remaining pairs still resolve.
 *
 * @module
 */

import { type Result, err, ok } from "@pbfstream/shared/result"
import { LogicError } from "./errors"
import type { OsmPbfStringTable } from "./proto/osmformat"

export type TagResult = Result<string, LogicError>
export type TagPair = [key: TagResult, value: TagResult]

const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Resolve a single string table index to a string.
 */
export function getString(
	stringtable: OsmPbfStringTable,
	index: number,
): TagResult {
	if (!Number.isInteger(index) || index < 0) {
		return err(new LogicError(`string table index ${index} is invalid`))
	}
	const bytes = stringtable[index]
	if (bytes === undefined) {
		return err(
			new LogicError(
				`string table index ${index} is out of bounds (${stringtable.length})`,
			),
		)
	}
	try {
		return ok(decoder.decode(bytes))
	} catch (error) {
		return err(
			new LogicError(`string at index ${index} is not valid UTF-8`, {
				cause: error,
			}),
		)
	}
}

/**
 * Lazily resolve parallel `keys` and `vals` columns. Pairs are produced up to
 * the length of the shorter column.
 *
 * @example
 * ```ts
 * for (const [key, value] of readTags(block.stringtable, way.keys, way.vals)) {
 *   if (key.ok && value.ok) console.log(`${key.value}=${value.value}`)
 * }
 * ```
 */
export function* readTags(
	stringtable: OsmPbfStringTable,
	keys: ArrayLike<number>,
	vals: ArrayLike<number>,
): Generator<TagPair> {
	const length = Math.min(keys.length, vals.length)
	for (let i = 0; i < length; i++) {
		const key = keys[i]
		const value = vals[i]
		if (key === undefined || value === undefined) return
		yield [getString(stringtable, key), getString(stringtable, value)]
	}
}

/**
 * Lazily resolve the interleaved `key, value, key, value, ...` run of a dense
 * node. A trailing unpaired index is ignored.
 */
export function* readDenseTags(
	stringtable: OsmPbfStringTable,
	keyValueIndices: ArrayLike<number>,
): Generator<TagPair> {
	for (let i = 0; i + 1 < keyValueIndices.length; i += 2) {
		const key = keyValueIndices[i]
		const value = keyValueIndices[i + 1]
		if (key === undefined || value === undefined) return
		yield [getString(stringtable, key), getString(stringtable, value)]
	}
}

/**
 * Collect resolved pairs into an object, skipping pairs where either side
 * failed. Later duplicates of a key win. Every key becomes an own property,
 * including `__proto__`.
 */
export function getTagObject(pairs: Iterable<TagPair>): Record<string, string> {
	const entries: [string, string][] = []
	for (const [key, value] of pairs) {
		if (key.ok && value.ok) entries.push([key.value, value.value])
	}
	return Object.fromEntries(entries)
}
