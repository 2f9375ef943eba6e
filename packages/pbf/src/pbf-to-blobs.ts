/**
 * Blob framing.
 *
 * An OSM PBF file is a sequence of records: a 4-byte big-endian BlobHeader
 * length, the BlobHeader message, then `BlobHeader.datasize` bytes of Blob.
 * The readers here split a byte stream into those records without
 * decompressing or decoding the Blob itself.
 *
 * Framing errors are thrown. A thrown error closes the generator, so reading
 * never resumes at a misaligned offset.
 *
 * @module
 */

import { type ByteSource, fileSource } from "./byte-source"
import {
	InvalidBlobDataError,
	InvalidBlobHeaderError,
	OsmPbfError,
	PbfIoError,
} from "./errors"
import {
	HEADER_LENGTH_BYTES,
	MAX_BLOB_SIZE_BYTES,
	MAX_HEADER_SIZE_BYTES,
	OSM_DATA_TYPE,
	OSM_HEADER_TYPE,
} from "./limits"
import { decodeMessage } from "./proto/decode"
import { type OsmPbfBlobHeader, readBlobHeader } from "./proto/fileformat"
import {
	type AsyncGeneratorValue,
	type ByteChunk,
	readInt32BE,
	toByteChunks,
} from "./utils"

export type BlockType = "header" | "primitive" | "unknown"

/**
 * An undecoded, possibly compressed block and the type it was framed with.
 */
export interface RawBlock {
	type: BlockType
	/** `BlobHeader.type` as found in the file. */
	blobType: string
	/** The serialized Blob message. */
	data: Uint8Array
}

/**
 * Classify a `BlobHeader.type` by exact match.
 */
export function blockTypeOf(blobType: string): BlockType {
	if (blobType === OSM_HEADER_TYPE) return "header"
	if (blobType === OSM_DATA_TYPE) return "primitive"
	return "unknown"
}

function checkHeaderLength(length: number) {
	if (length < 0 || length >= MAX_HEADER_SIZE_BYTES) {
		throw new InvalidBlobHeaderError(
			`BlobHeader length ${length} is outside the allowed range [0, ${MAX_HEADER_SIZE_BYTES})`,
		)
	}
	return length
}

function decodeBlobHeader(bytes: Uint8Array): OsmPbfBlobHeader {
	const header = decodeMessage(bytes, readBlobHeader, "BlobHeader")
	if (header.datasize < 0 || header.datasize >= MAX_BLOB_SIZE_BYTES) {
		throw new InvalidBlobDataError(
			`Blob size ${header.datasize} is outside the allowed range [0, ${MAX_BLOB_SIZE_BYTES})`,
		)
	}
	return header
}

function expectLength(bytes: Uint8Array, length: number, what: string) {
	if (bytes.length < length) {
		throw new PbfIoError(
			`Unexpected end of input in ${what}: read ${bytes.length} of ${length} bytes`,
		)
	}
	return bytes
}

function wrapReadError(error: unknown, what: string) {
	if (error instanceof OsmPbfError) return error
	const detail = error instanceof Error ? error.message : String(error)
	return new PbfIoError(`Failed to read ${what}: ${detail}`, { cause: error })
}

/**
 * Read up to `length` bytes, stopping early only at the end of the input.
 */
function readUpTo(source: ByteSource, length: number, what: string) {
	const out = new Uint8Array(length)
	let filled = 0
	while (filled < length) {
		let n: number
		try {
			n = source.read(out.subarray(filled))
		} catch (error) {
			throw wrapReadError(error, what)
		}
		if (n === 0) break
		filled += n
	}
	return filled === length ? out : out.subarray(0, filled)
}

function readExact(source: ByteSource, length: number, what: string) {
	return expectLength(readUpTo(source, length, what), length, what)
}

/**
 * Lazily read raw blocks from a synchronous byte source.
 *
 * The sequence ends cleanly only when the input ends exactly at a record
 * boundary.
 *
 * @throws PbfIoError on a read failure or truncated record.
 * @throws InvalidBlobHeaderError if a header length is negative or >= 64 KiB.
 * @throws PbfParseError if a BlobHeader cannot be decoded.
 * @throws InvalidBlobDataError if a blob size is negative or >= 32 MiB.
 *
 * @example
 * ```ts
 * import { bytesSource, OsmPbfBlockParser, readOsmPbfBlobs } from "@pbfstream/pbf"
 *
 * const parser = new OsmPbfBlockParser()
 * for (const raw of readOsmPbfBlobs(bytesSource(fileBytes))) {
 *   const block = parser.parse(raw)
 * }
 * ```
 */
export function* readOsmPbfBlobs(source: ByteSource): Generator<RawBlock> {
	while (true) {
		const prefix = readUpTo(source, HEADER_LENGTH_BYTES, "BlobHeader length")
		if (prefix.length === 0) return
		expectLength(prefix, HEADER_LENGTH_BYTES, "BlobHeader length")
		const headerLength = checkHeaderLength(readInt32BE(prefix))

		const header = decodeBlobHeader(
			readExact(source, headerLength, "BlobHeader"),
		)
		const data = readExact(source, header.datasize, `${header.type} blob`)
		yield { type: blockTypeOf(header.type), blobType: header.type, data }
	}
}

/**
 * Lazily read raw blocks from a file. The file is closed when iteration
 * finishes, fails, or is abandoned with `break`/`return`.
 */
export function* readOsmPbfFileBlobs(path: string): Generator<RawBlock> {
	let source: ReturnType<typeof fileSource>
	try {
		source = fileSource(path)
	} catch (error) {
		throw wrapReadError(error, path)
	}
	try {
		yield* readOsmPbfBlobs(source)
	} finally {
		source.close()
	}
}

/**
 * Pulls exact byte counts out of an async sequence of arbitrarily sized chunks.
 */
class ChunkReader {
	#chunks: AsyncGenerator<Uint8Array>
	#current: Uint8Array = new Uint8Array(0)
	#offset = 0

	constructor(chunks: AsyncGenerator<Uint8Array>) {
		this.#chunks = chunks
	}

	async readUpTo(length: number, what: string): Promise<Uint8Array> {
		const out = new Uint8Array(length)
		let filled = 0
		while (filled < length) {
			if (this.#offset >= this.#current.length) {
				let next: IteratorResult<Uint8Array>
				try {
					next = await this.#chunks.next()
				} catch (error) {
					throw wrapReadError(error, what)
				}
				if (next.done) break
				this.#current = next.value
				this.#offset = 0
				continue
			}
			const n = Math.min(
				length - filled,
				this.#current.length - this.#offset,
			)
			out.set(this.#current.subarray(this.#offset, this.#offset + n), filled)
			this.#offset += n
			filled += n
		}
		return filled === length ? out : out.subarray(0, filled)
	}

	async readExact(length: number, what: string) {
		return expectLength(await this.readUpTo(length, what), length, what)
	}

	async close() {
		await this.#chunks.return(undefined)
	}
}

/**
 * Lazily read raw blocks from a buffer, `ReadableStream` or async iterable of
 * byte chunks. Framing rules and errors are the same as `readOsmPbfBlobs`;
 * chunk boundaries may fall anywhere.
 *
 * @example
 * ```ts
 * import { createReadStream } from "node:fs"
 * import { readOsmPbfBlobsAsync } from "@pbfstream/pbf"
 *
 * for await (const raw of readOsmPbfBlobsAsync(createReadStream("monaco.osm.pbf"))) {
 *   console.log(raw.blobType, raw.data.length)
 * }
 * ```
 */
export async function* readOsmPbfBlobsAsync(
	data: AsyncGeneratorValue<ByteChunk>,
): AsyncGenerator<RawBlock> {
	const reader = new ChunkReader(toByteChunks(data))
	try {
		while (true) {
			const prefix = await reader.readUpTo(
				HEADER_LENGTH_BYTES,
				"BlobHeader length",
			)
			if (prefix.length === 0) return
			expectLength(prefix, HEADER_LENGTH_BYTES, "BlobHeader length")
			const headerLength = checkHeaderLength(readInt32BE(prefix))

			const header = decodeBlobHeader(
				await reader.readExact(headerLength, "BlobHeader"),
			)
			const blob = await reader.readExact(
				header.datasize,
				`${header.type} blob`,
			)
			yield {
				type: blockTypeOf(header.type),
				blobType: header.type,
				data: blob,
			}
		}
	} finally {
		await reader.close()
	}
}
