export type AsyncGeneratorValue<T> =
	| T
	| ReadableStream<T>
	| AsyncIterable<T>
	| Iterable<T>
	| Promise<T>
	| Promise<ReadableStream<T>>
	| Promise<AsyncIterable<T>>

export type ByteChunk = Uint8Array | ArrayBuffer

/**
 * Convert a single chunk, a stream, or an iterable of chunks into an async
 * generator of `Uint8Array` chunks.
 */
export async function* toByteChunks(
	v: AsyncGeneratorValue<ByteChunk>,
): AsyncGenerator<Uint8Array> {
	const value = await v
	if (value == null) throw Error("Value is null")
	if (value instanceof ArrayBuffer) {
		yield new Uint8Array(value)
	} else if (value instanceof Uint8Array) {
		// Uint8Array and Buffer are single chunks, not iterables of bytes
		yield value
	} else if (value instanceof ReadableStream) {
		const reader = value.getReader()
		try {
			while (true) {
				const { done, value: chunk } = await reader.read()
				if (done) return
				yield toUint8Array(chunk)
			}
		} finally {
			reader.releaseLock()
		}
	} else {
		for await (const chunk of value) yield toUint8Array(chunk)
	}
}

function toUint8Array(chunk: ByteChunk) {
	return chunk instanceof Uint8Array ? chunk : new Uint8Array(chunk)
}

/**
 * Read a big-endian signed 32-bit integer.
 */
export function readInt32BE(bytes: Uint8Array, offset = 0): number {
	return new DataView(
		bytes.buffer,
		bytes.byteOffset,
		bytes.byteLength,
	).getInt32(offset, false)
}
