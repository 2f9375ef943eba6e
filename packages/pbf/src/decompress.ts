/**
 * Pluggable blob decompression.
 *
 * Every OSM PBF reader is expected to handle zlib, which `ZlibDecompressor`
 * covers with `node:zlib`. LZ4, LZMA and Zstandard payloads are left to a
 * `Decompressor` supplied by the embedder.
 *
 * @module
 */

import { inflateSync } from "node:zlib"
import { DecompressionError } from "./errors"
import { MAX_BLOB_SIZE_BYTES } from "./limits"

export type CompressionMethod = "zlib" | "lz4" | "lzma" | "zstd"

export interface Decompressor {
	/**
	 * Decompress `input` into `output`, which is sized to the declared
	 * uncompressed length and must be filled completely.
	 *
	 * @throws DecompressionError with reason `unsupported` for methods the
	 * implementation does not handle.
	 */
	decompress(
		method: CompressionMethod,
		input: Uint8Array,
		output: Uint8Array,
	): void
}

/**
 * The default decompressor. Supports zlib only.
 *
 * Extend it to add other methods and defer to `super.decompress` for zlib:
 *
 * @example
 * ```ts
 * class ZstdDecompressor extends ZlibDecompressor {
 *   override decompress(method: CompressionMethod, input: Uint8Array, output: Uint8Array) {
 *     if (method !== "zstd") return super.decompress(method, input, output)
 *     output.set(zstdDecompress(input))
 *   }
 * }
 * ```
 */
export class ZlibDecompressor implements Decompressor {
	decompress(
		method: CompressionMethod,
		input: Uint8Array,
		output: Uint8Array,
	): void {
		if (method !== "zlib") throw DecompressionError.unsupported(method)

		let inflated: Uint8Array
		try {
			// Anything longer than the declared size is rejected below, so stop early.
			inflated = inflateSync(input, {
				maxOutputLength: Math.max(output.length + 1, 1),
			})
		} catch (error) {
			throw DecompressionError.internal(method, error)
		}
		if (inflated.length !== output.length) {
			throw DecompressionError.internal(
				method,
				new Error(
					`inflated ${inflated.length} bytes, expected ${output.length}`,
				),
			)
		}
		output.set(inflated)
	}
}

export const defaultDecompressor: Decompressor = new ZlibDecompressor()

/**
 * Inflate zlib data whose uncompressed size was not declared, refusing
 * output longer than `maxLength` bytes.
 */
export function inflateZlib(
	input: Uint8Array,
	maxLength = MAX_BLOB_SIZE_BYTES,
): Uint8Array {
	let inflated: Uint8Array
	try {
		inflated = inflateSync(input, { maxOutputLength: maxLength + 1 })
	} catch (error) {
		throw DecompressionError.internal("zlib", error)
	}
	if (inflated.length > maxLength) {
		throw DecompressionError.internal(
			"zlib",
			new Error(`inflated more than ${maxLength} bytes`),
		)
	}
	return inflated
}
