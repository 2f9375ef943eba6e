/**
 * Synchronous byte sources for the blob framer.
 *
 * @module
 */

import { closeSync, openSync, readSync } from "node:fs"

/**
 * A pull-based, ordered source of bytes.
 */
export interface ByteSource {
	/**
	 * Copy up to `target.length` bytes into `target`.
	 * @returns The number of bytes written, or 0 at the end of the input.
	 */
	read(target: Uint8Array): number
}

/**
 * A byte source that can release an underlying resource.
 */
export interface ClosableByteSource extends ByteSource {
	close(): void
}

/**
 * Read from an in-memory buffer.
 */
export function bytesSource(data: Uint8Array | ArrayBuffer): ByteSource {
	const bytes = data instanceof Uint8Array ? data : new Uint8Array(data)
	let offset = 0
	return {
		read(target) {
			const n = Math.min(target.length, bytes.length - offset)
			target.set(bytes.subarray(offset, offset + n))
			offset += n
			return n
		},
	}
}

/**
 * Read a file sequentially through a file descriptor. The caller owns the
 * returned source and must `close` it.
 */
export function fileSource(path: string): ClosableByteSource {
	let fd: number | null = openSync(path, "r")
	return {
		read(target) {
			if (fd === null) throw Error(`${path} has been closed`)
			return readSync(fd, target, 0, target.length, null)
		},
		close() {
			if (fd === null) return
			closeSync(fd)
			fd = null
		},
	}
}
