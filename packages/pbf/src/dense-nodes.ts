/**
 * Reader for dense nodes.
 *
 * `DenseNodes` stores many nodes as parallel, delta coded columns: ids,
 * coordinates and optional metadata. Keys and values are packed into a single
 * `keys_vals` column holding, per node, `(key, value)` string table index
 * pairs followed by one `0` terminator.
 *
 * @module
 */

import { type Result, err, ok } from "@pbfstream/shared/result"
import { LogicError } from "./errors"
import type {
	OsmPbfDenseInfo,
	OsmPbfDenseNodes,
	OsmPbfInfo,
} from "./proto/osmformat"

/**
 * A node unpacked from a `DenseNodes` column set.
 */
export interface DenseNode {
	/** Position of the node in the column set. */
	index: number
	id: number
	/** Encoded latitude. Use `normalizeCoord` to convert it to nanodegrees. */
	lat: number
	/** Encoded longitude. Use `normalizeCoord` to convert it to nanodegrees. */
	lon: number
	/** Metadata, present when the column set has `denseinfo`. */
	info?: OsmPbfInfo
	/**
	 * Interleaved key/value string table indexes of this node, without the
	 * terminator. Use `readDenseTags` to resolve them.
	 */
	keyValueIndices: number[]
}

const MAX_USER_SID = 0xffff_ffff

/**
 * Iterates the nodes of a `DenseNodes` column set in column order.
 *
 * Each step yields a `Result`: a node whose metadata or key/value run is
 * corrupt fails on its own and iteration continues with the next node.
 *
 * @example
 * ```ts
 * for (const group of block.primitivegroup) {
 *   if (!group.dense) continue
 *   for (const result of new DenseNodeReader(group.dense)) {
 *     if (!result.ok) continue
 *     for (const [key, value] of readDenseTags(block.stringtable, result.value.keyValueIndices)) {
 *       if (key.ok && value.ok) console.log(`${key.value}=${value.value}`)
 *     }
 *   }
 * }
 * ```
 */
export class DenseNodeReader
	implements IterableIterator<Result<DenseNode, LogicError>>
{
	#dense: OsmPbfDenseNodes
	#index = 0
	// Start of the next node's run in `keys_vals`
	#keyValueIndex = 0
	#current = {
		id: 0,
		lat: 0,
		lon: 0,
		timestamp: 0,
		changeset: 0,
		uid: 0,
		user_sid: 0,
	}

	/**
	 * @throws LogicError if the id, lat and lon columns differ in length.
	 */
	constructor(dense: OsmPbfDenseNodes) {
		const { id, lat, lon } = dense
		if (lat.length !== id.length || lon.length !== id.length) {
			throw new LogicError(
				`dense node id/lat/lon counts differ: ${id.length}/${lat.length}/${lon.length}`,
			)
		}
		this.#dense = dense
	}

	/** Number of nodes in the column set. */
	get length() {
		return this.#dense.id.length
	}

	next(): IteratorResult<Result<DenseNode, LogicError>> {
		const index = this.#index
		const { id, lat, lon, denseinfo } = this.#dense
		const idDelta = id[index]
		const latDelta = lat[index]
		const lonDelta = lon[index]
		if (
			idDelta === undefined ||
			latDelta === undefined ||
			lonDelta === undefined
		) {
			return { done: true, value: undefined }
		}
		this.#index++

		const current = this.#current
		current.id += idDelta
		current.lat += latDelta
		current.lon += lonDelta

		// Both are read before either can fail, so every column stays aligned.
		const info = denseinfo ? this.#readInfo(denseinfo, index) : undefined
		const keyValueIndices = this.#readKeyValueIndices(index)

		if (info && !info.ok) return { done: false, value: info }
		if (!keyValueIndices.ok) return { done: false, value: keyValueIndices }

		const node: DenseNode = {
			index,
			id: current.id,
			lat: current.lat,
			lon: current.lon,
			keyValueIndices: keyValueIndices.value,
		}
		if (info) node.info = info.value
		return { done: false, value: ok(node) }
	}

	[Symbol.iterator]() {
		return this
	}

	#readInfo(
		denseinfo: OsmPbfDenseInfo,
		index: number,
	): Result<OsmPbfInfo, LogicError> {
		const current = this.#current
		const info: OsmPbfInfo = {}

		const version = denseinfo.version[index]
		if (version !== undefined) info.version = version

		const timestamp = denseinfo.timestamp[index]
		if (timestamp !== undefined) {
			current.timestamp += timestamp
			info.timestamp = current.timestamp
		}

		const changeset = denseinfo.changeset[index]
		if (changeset !== undefined) {
			current.changeset += changeset
			info.changeset = current.changeset
		}

		const uid = denseinfo.uid[index]
		if (uid !== undefined) {
			current.uid += uid
			info.uid = current.uid
		}

		const visible = denseinfo.visible[index]
		if (visible !== undefined) info.visible = visible

		// user_sid is an unsigned string table index; keep the last valid value on failure.
		const userSidDelta = denseinfo.user_sid[index]
		if (userSidDelta !== undefined) {
			const userSid = current.user_sid + userSidDelta
			if (userSid < 0) {
				return err(
					new LogicError(
						`delta decoding \`user_sid\` results in a negative integer: ${current.user_sid}+${userSidDelta}`,
					),
				)
			}
			if (userSid > MAX_USER_SID) {
				return err(
					new LogicError(
						`delta decoding \`user_sid\` exceeds ${MAX_USER_SID}: ${current.user_sid}+${userSidDelta}`,
					),
				)
			}
			current.user_sid = userSid
			info.user_sid = userSid
		}

		return ok(info)
	}

	#readKeyValueIndices(index: number): Result<number[], LogicError> {
		const keysVals = this.#dense.keys_vals
		if (keysVals.length === 0) return ok([])

		const start = this.#keyValueIndex
		if (start >= keysVals.length) {
			return err(
				new LogicError(
					`keys_vals ended before dense node ${index} (${keysVals.length} entries)`,
				),
			)
		}

		// Only keys can be the terminator, so look at even offsets from the run start.
		let end = start
		while (end < keysVals.length && keysVals[end] !== 0) end += 2
		if (end >= keysVals.length) {
			this.#keyValueIndex = keysVals.length
			return err(
				new LogicError(
					`keys_vals run of dense node ${index} starting at ${start} is not terminated`,
				),
			)
		}
		this.#keyValueIndex = end + 1

		if (index === this.length - 1 && this.#keyValueIndex < keysVals.length) {
			return err(
				new LogicError(
					`keys_vals has ${keysVals.length - this.#keyValueIndex} entries left after the last dense node`,
				),
			)
		}

		return ok(keysVals.slice(start, end))
	}
}
