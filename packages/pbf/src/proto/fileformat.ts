/**
 * Readers for `fileformat.proto`: the BlobHeader and Blob envelope messages.
 *
 * @module
 */

import type Pbf from "pbf"
import { PbfParseError } from "../errors"

export interface OsmPbfBlobHeader {
	type: string
	indexdata?: Uint8Array
	datasize: number
}

/** Names of the `Blob.data` oneof members. */
export type OsmPbfBlobDataType =
	| "raw"
	| "zlib_data"
	| "lzma_data"
	| "OBSOLETE_bzip2_data"
	| "lz4_data"
	| "zstd_data"

export interface OsmPbfBlob {
	raw_size?: number
	/** The payload that was set, if any. Later fields win, as with any oneof. */
	data?: {
		type: OsmPbfBlobDataType
		bytes: Uint8Array
	}
}

type OsmPbfBlobHeaderFields = Partial<OsmPbfBlobHeader>

function readBlobHeaderField(
	tag: number,
	header: OsmPbfBlobHeaderFields,
	pbf: Pbf,
) {
	if (tag === 1) header.type = pbf.readString()
	else if (tag === 2) header.indexdata = pbf.readBytes()
	else if (tag === 3) header.datasize = pbf.readVarint(true)
}

/**
 * Read a BlobHeader. `type` and `datasize` are required.
 */
export function readBlobHeader(pbf: Pbf, end?: number): OsmPbfBlobHeader {
	const fields: OsmPbfBlobHeaderFields = {}
	const { type, indexdata, datasize } = pbf.readFields(
		readBlobHeaderField,
		fields,
		end,
	)
	if (type === undefined) throw new PbfParseError("BlobHeader has no type")
	if (datasize === undefined)
		throw new PbfParseError("BlobHeader has no datasize")
	return { type, indexdata, datasize }
}

const BLOB_DATA_FIELDS: Record<number, OsmPbfBlobDataType> = {
	1: "raw",
	3: "zlib_data",
	4: "lzma_data",
	5: "OBSOLETE_bzip2_data",
	6: "lz4_data",
	7: "zstd_data",
}

function readBlobField(tag: number, blob: OsmPbfBlob, pbf: Pbf) {
	if (tag === 2) {
		blob.raw_size = pbf.readVarint(true)
		return
	}
	const type = BLOB_DATA_FIELDS[tag]
	if (type !== undefined) blob.data = { type, bytes: pbf.readBytes() }
}

/**
 * Read a Blob. Payload bytes are views into the `Pbf` buffer.
 */
export function readBlob(pbf: Pbf, end?: number): OsmPbfBlob {
	const blob: OsmPbfBlob = {}
	return pbf.readFields(readBlobField, blob, end)
}
