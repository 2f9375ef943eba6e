/**
 * Errors raised while reading OSM PBF data.
 *
 * Every error extends `OsmPbfError` and carries a `kind` so callers can
 * switch on the failure without `instanceof` chains. Frame, blob and block
 * failures are thrown; failures scoped to a single dense node or tag are
 * returned as `Result` values carrying a `LogicError`.
 *
 * @module
 */

export type OsmPbfErrorKind =
	| "io"
	| "parse"
	| "invalid-blob-header"
	| "invalid-blob-data"
	| "decompression"
	| "logic"

export abstract class OsmPbfError extends Error {
	abstract readonly kind: OsmPbfErrorKind

	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = new.target.name
	}
}

/** Reading from the input failed or ended in the middle of a record. */
export class PbfIoError extends OsmPbfError {
	override readonly kind = "io"
}

/** A protobuf message could not be decoded. */
export class PbfParseError extends OsmPbfError {
	override readonly kind = "parse"
}

/** The BlobHeader length prefix is negative or not below 64 KiB. */
export class InvalidBlobHeaderError extends OsmPbfError {
	override readonly kind = "invalid-blob-header"
}

/**
 * The blob is structurally invalid: bad data size, no payload, or an obsolete
 * compression method.
 */
export class InvalidBlobDataError extends OsmPbfError {
	override readonly kind = "invalid-blob-data"
}

export type DecompressionFailure = "unsupported" | "internal"

/** A blob payload could not be decompressed. */
export class DecompressionError extends OsmPbfError {
	override readonly kind = "decompression"
	readonly reason: DecompressionFailure

	constructor(
		reason: DecompressionFailure,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options)
		this.reason = reason
	}

	static unsupported(method: string) {
		return new DecompressionError(
			"unsupported",
			`${method} compression is not supported`,
		)
	}

	static internal(method: string, cause: unknown) {
		const detail = cause instanceof Error ? `: ${cause.message}` : ""
		return new DecompressionError(
			"internal",
			`${method} decompression failed${detail}`,
			{ cause },
		)
	}
}

/**
 * Decoded data violates an invariant of the format, such as mismatched
 * dense node columns or an out of bounds string table index.
 */
export class LogicError extends OsmPbfError {
	override readonly kind = "logic"
}

/** Type guard for errors raised by this package. */
export function isOsmPbfError(error: unknown): error is OsmPbfError {
	return error instanceof OsmPbfError
}
