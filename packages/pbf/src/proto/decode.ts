import Pbf from "pbf"
import { OsmPbfError, PbfParseError } from "../errors"

export type MessageReader<T> = (pbf: Pbf, end: number) => T

/**
 * Decode a complete message from `bytes`.
 *
 * `Pbf` does not bounds check its reads, so a message that ends anywhere but
 * exactly at the end of `bytes` is reported as truncated.
 *
 * @throws PbfParseError if the bytes are not a valid `name` message.
 */
export function decodeMessage<T>(
	bytes: Uint8Array,
	read: MessageReader<T>,
	name: string,
): T {
	const pbf = new Pbf(bytes)
	let message: T
	try {
		message = read(pbf, bytes.length)
	} catch (error) {
		if (error instanceof OsmPbfError) throw error
		throw new PbfParseError(
			`${name} could not be decoded: ${error instanceof Error ? error.message : String(error)}`,
			{ cause: error },
		)
	}
	if (pbf.pos !== bytes.length) {
		throw new PbfParseError(
			`${name} is truncated: read ${pbf.pos} of ${bytes.length} bytes`,
		)
	}
	return message
}

/**
 * Read a length-delimited embedded message at the current position.
 */
export function readEmbedded<T>(pbf: Pbf, read: MessageReader<T>): T {
	const end = pbf.readVarint() + pbf.pos
	const message = read(pbf, end)
	if (pbf.pos !== end) {
		throw new PbfParseError(
			`Embedded message overran its length: ended at ${pbf.pos}, expected ${end}`,
		)
	}
	return message
}
