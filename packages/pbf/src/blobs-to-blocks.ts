/**
 * Blob-to-block conversion.
 *
 * Decompresses the Blob envelope of a framed `RawBlock` into a reusable
 * buffer and decodes it as a header block, a primitive block, or passes the
 * bytes of an unknown block through.
 *
 * @module
 */

import {
	type CompressionMethod,
	type Decompressor,
	defaultDecompressor,
	inflateZlib,
} from "./decompress"
import { DecompressionError, InvalidBlobDataError } from "./errors"
import { MAX_BLOB_SIZE_BYTES } from "./limits"
import type { RawBlock } from "./pbf-to-blobs"
import { decodeMessage } from "./proto/decode"
import { type OsmPbfBlobDataType, readBlob } from "./proto/fileformat"
import {
	type OsmPbfBlock,
	type OsmPbfHeaderBlock,
	readHeaderBlock,
	readPrimitiveBlock,
} from "./proto/osmformat"

export type OsmPbfParsedBlock =
	| { type: "header"; block: OsmPbfHeaderBlock }
	| { type: "primitive"; block: OsmPbfBlock }
	| {
			type: "unknown"
			blobType: string
			/** View into the parser's buffer, valid until its next `parse` call. */
			bytes: Uint8Array
	  }

export interface OsmPbfBlockParserOptions {
	/**
	 * Decompressor for compressed payloads. Defaults to `ZlibDecompressor`.
	 * zlib payloads fall back to the default if this one refuses them.
	 */
	decompressor?: Decompressor
}

type CompressedDataType = Exclude<
	OsmPbfBlobDataType,
	"raw" | "OBSOLETE_bzip2_data"
>

const COMPRESSION_METHODS: Record<CompressedDataType, CompressionMethod> = {
	zlib_data: "zlib",
	lz4_data: "lz4",
	lzma_data: "lzma",
	zstd_data: "zstd",
}

/**
 * Parser for `RawBlock`s with an internal, reusable decompression buffer.
 *
 * The buffer is overwritten by every `parse` call, so instances must not be
 * shared between concurrent consumers. When decoding in parallel, keep one
 * long-lived parser per worker.
 *
 * @example
 * ```ts
 * import { bytesSource, OsmPbfBlockParser, readOsmPbfBlobs } from "@pbfstream/pbf"
 *
 * const parser = new OsmPbfBlockParser()
 * for (const raw of readOsmPbfBlobs(bytesSource(fileBytes))) {
 *   const parsed = parser.parse(raw)
 *   if (parsed.type === "primitive") {
 *     console.log(parsed.block.primitivegroup.length, "groups")
 *   }
 * }
 * ```
 */
export class OsmPbfBlockParser {
	#decompressor: Decompressor
	#storage = new Uint8Array(0)
	#length = 0

	constructor(options: OsmPbfBlockParserOptions = {}) {
		this.#decompressor = options.decompressor ?? defaultDecompressor
	}

	/**
	 * The uncompressed contents of the most recently parsed blob.
	 */
	get buffer(): Uint8Array {
		return this.#storage.subarray(0, this.#length)
	}

	/**
	 * Decompress and decode a raw block.
	 *
	 * @throws PbfParseError if the Blob or the block message is malformed.
	 * @throws InvalidBlobDataError if the Blob has no payload, an obsolete
	 * payload, an invalid `raw_size`, or a non-zlib payload without one.
	 * @throws DecompressionError if the payload cannot be decompressed.
	 */
	parse(raw: RawBlock): OsmPbfParsedBlock {
		const blob = decodeMessage(raw.data, readBlob, "Blob")

		if (blob.raw_size !== undefined) {
			if (blob.raw_size < 0 || blob.raw_size > MAX_BLOB_SIZE_BYTES) {
				throw new InvalidBlobDataError(
					`Blob raw_size ${blob.raw_size} is outside the allowed range [0, ${MAX_BLOB_SIZE_BYTES}]`,
				)
			}
			this.#resize(blob.raw_size)
		}

		if (blob.data === undefined) {
			throw new InvalidBlobDataError("Blob has no data")
		}
		const { type: dataType, bytes } = blob.data
		if (dataType === "raw") {
			this.#resize(bytes.length).set(bytes)
		} else if (dataType === "OBSOLETE_bzip2_data") {
			throw new InvalidBlobDataError("Blob uses obsolete bzip2 compression")
		} else {
			const method = COMPRESSION_METHODS[dataType]
			if (blob.raw_size !== undefined) {
				this.#decompress(method, bytes, this.buffer)
			} else if (method === "zlib") {
				const inflated = inflateZlib(bytes)
				this.#resize(inflated.length).set(inflated)
			} else {
				// Pluggable decompressors write into an exact-size output.
				throw new InvalidBlobDataError(
					`${method} compressed Blob does not declare raw_size`,
				)
			}
		}

		return this.#decodeBuffer(raw)
	}

	#resize(length: number): Uint8Array {
		if (length > this.#storage.length) {
			this.#storage = new Uint8Array(length)
		}
		this.#length = length
		return this.buffer
	}

	#decompress(method: CompressionMethod, input: Uint8Array, output: Uint8Array) {
		try {
			this.#decompressor.decompress(method, input, output)
		} catch (error) {
			if (
				method === "zlib" &&
				this.#decompressor !== defaultDecompressor &&
				error instanceof DecompressionError &&
				error.reason === "unsupported"
			) {
				defaultDecompressor.decompress(method, input, output)
				return
			}
			throw error instanceof DecompressionError
				? error
				: DecompressionError.internal(method, error)
		}
	}

	#decodeBuffer(raw: RawBlock): OsmPbfParsedBlock {
		switch (raw.type) {
			case "header":
				return {
					type: "header",
					block: decodeMessage(this.buffer, readHeaderBlock, "HeaderBlock"),
				}
			case "primitive":
				return {
					type: "primitive",
					block: decodeMessage(
						this.buffer,
						readPrimitiveBlock,
						"PrimitiveBlock",
					),
				}
			case "unknown":
				return { type: "unknown", blobType: raw.blobType, bytes: this.buffer }
		}
	}
}
