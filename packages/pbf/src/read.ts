/**
 * Convenience readers that frame, decompress and decode a whole file.
 *
 * The lower level pieces (`readOsmPbfBlobs`, `OsmPbfBlockParser`) stay silent;
 * these drivers add progress reporting on top and skip blocks of unknown type.
 *
 * @module
 */

import {
	createProgressReporter,
	type ProgressCallback,
	type ProgressReporter,
} from "@pbfstream/shared/progress"
import {
	type OsmPbfBlockParserOptions,
	OsmPbfBlockParser,
	type OsmPbfParsedBlock,
} from "./blobs-to-blocks"
import type { ByteSource } from "./byte-source"
import { LogicError } from "./errors"
import {
	type RawBlock,
	readOsmPbfBlobs,
	readOsmPbfBlobsAsync,
} from "./pbf-to-blobs"
import type { OsmPbfHeaderBlock } from "./proto/osmformat"
import type { AsyncGeneratorValue, ByteChunk } from "./utils"

export interface ReadOsmPbfOptions extends OsmPbfBlockParserOptions {
	/** Receives progress messages. Defaults to `logProgress`. */
	onProgress?: ProgressCallback
	/** Minimum milliseconds between routine progress messages. Defaults to 1000. */
	progressInterval?: number
}

/** A decoded header or primitive block. */
export type OsmPbfKnownBlock = Exclude<OsmPbfParsedBlock, { type: "unknown" }>

/**
 * Tracks counts for one read and turns each raw block into a known block, or
 * `null` for a skipped one.
 */
class ReadSession {
	#parser: OsmPbfBlockParser
	#reporter: ProgressReporter
	#started = Date.now()
	#blocks = 0
	#bytes = 0
	#skipped = 0

	constructor(options: ReadOsmPbfOptions) {
		this.#parser = new OsmPbfBlockParser(options)
		this.#reporter = createProgressReporter(
			options.onProgress,
			options.progressInterval,
		)
	}

	parse(raw: RawBlock): OsmPbfKnownBlock | null {
		this.#bytes += raw.data.length
		const parsed = this.#parser.parse(raw)
		if (parsed.type === "unknown") {
			this.#skipped++
			this.#reporter.report(
				`Skipping unknown block type "${parsed.blobType}" (${parsed.bytes.length} bytes)`,
			)
			return null
		}
		this.#blocks++
		this.#reporter.update(
			`Parsed ${this.#blocks.toLocaleString()} blocks (${this.#bytes.toLocaleString()} bytes)`,
		)
		return parsed
	}

	finish() {
		const skipped = this.#skipped > 0 ? `, skipped ${this.#skipped}` : ""
		this.#reporter.report(
			`Finished reading ${this.#blocks.toLocaleString()} blocks${skipped} in ${Date.now() - this.#started}ms`,
		)
	}
}

/**
 * Read every header and primitive block from a synchronous byte source.
 *
 * Blocks of unknown type are skipped with a progress message. Framing,
 * decompression and decoding errors are thrown and end the read.
 *
 * @example
 * ```ts
 * import { fileSource, readOsmPbf } from "@pbfstream/pbf"
 *
 * const source = fileSource("./monaco.osm.pbf")
 * try {
 *   for (const parsed of readOsmPbf(source)) {
 *     if (parsed.type === "primitive") console.log(parsed.block.primitivegroup.length)
 *   }
 * } finally {
 *   source.close()
 * }
 * ```
 */
export function* readOsmPbf(
	source: ByteSource,
	options: ReadOsmPbfOptions = {},
): Generator<OsmPbfKnownBlock> {
	const session = new ReadSession(options)
	for (const raw of readOsmPbfBlobs(source)) {
		const parsed = session.parse(raw)
		if (parsed) yield parsed
	}
	session.finish()
}

/**
 * Asynchronous version of `readOsmPbf` for buffers, `ReadableStream`s and
 * async iterables of byte chunks.
 */
export async function* readOsmPbfAsync(
	data: AsyncGeneratorValue<ByteChunk>,
	options: ReadOsmPbfOptions = {},
): AsyncGenerator<OsmPbfKnownBlock> {
	const session = new ReadSession(options)
	for await (const raw of readOsmPbfBlobsAsync(data)) {
		const parsed = session.parse(raw)
		if (parsed) yield parsed
	}
	session.finish()
}

/**
 * Read blocks until the first header block and return it.
 *
 * @throws LogicError if the input ends without a header block.
 */
export function readOsmPbfHeader(
	source: ByteSource,
	options: ReadOsmPbfOptions = {},
): OsmPbfHeaderBlock {
	for (const parsed of readOsmPbf(source, options)) {
		if (parsed.type === "header") return parsed.block
	}
	throw new LogicError("OSM PBF header block not found")
}
