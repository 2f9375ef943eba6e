import { deflateSync } from "node:zlib"
import Pbf from "pbf"
import type { OsmPbfBlob, OsmPbfBlobDataType } from "../src/proto/fileformat"
import type {
	OsmPbfBlock,
	OsmPbfDenseInfo,
	OsmPbfDenseNodes,
	OsmPbfGroup,
	OsmPbfHeaderBlock,
	OsmPbfInfo,
	OsmPbfNode,
	OsmPbfRelation,
	OsmPbfWay,
} from "../src/proto/osmformat"

const encoder = new TextEncoder()

export function concatBytes(...parts: Uint8Array[]) {
	const out = new Uint8Array(parts.reduce((n, part) => n + part.length, 0))
	let offset = 0
	for (const part of parts) {
		out.set(part, offset)
		offset += part.length
	}
	return out
}

export function int32BE(value: number) {
	const bytes = new Uint8Array(4)
	new DataView(bytes.buffer).setInt32(0, value, false)
	return bytes
}

// fileformat.proto

export function encodeBlobHeader(header: {
	type?: string
	indexdata?: Uint8Array
	datasize?: number
}) {
	const pbf = new Pbf()
	if (header.type !== undefined) pbf.writeStringField(1, header.type)
	if (header.indexdata !== undefined) pbf.writeBytesField(2, header.indexdata)
	if (header.datasize !== undefined) pbf.writeVarintField(3, header.datasize)
	return pbf.finish()
}

const BLOB_DATA_TAGS: Record<OsmPbfBlobDataType, number> = {
	raw: 1,
	zlib_data: 3,
	lzma_data: 4,
	OBSOLETE_bzip2_data: 5,
	lz4_data: 6,
	zstd_data: 7,
}

export function encodeBlob(blob: OsmPbfBlob) {
	const pbf = new Pbf()
	if (blob.raw_size !== undefined) pbf.writeVarintField(2, blob.raw_size)
	if (blob.data !== undefined) {
		pbf.writeBytesField(BLOB_DATA_TAGS[blob.data.type], blob.data.bytes)
	}
	return pbf.finish()
}

export function rawBlob(bytes: Uint8Array) {
	return encodeBlob({ raw_size: bytes.length, data: { type: "raw", bytes } })
}

export function zlibBlob(bytes: Uint8Array) {
	return encodeBlob({
		raw_size: bytes.length,
		data: { type: "zlib_data", bytes: deflateSync(bytes) },
	})
}

/**
 * Frame a serialized Blob: length prefix, BlobHeader, Blob.
 */
export function frame(type: string, blob: Uint8Array) {
	const header = encodeBlobHeader({ type, datasize: blob.length })
	return concatBytes(int32BE(header.length), header, blob)
}

// osmformat.proto

function writeHeaderBlock(header: OsmPbfHeaderBlock, pbf: Pbf) {
	if (header.bbox) {
		pbf.writeMessage(
			1,
			(bbox: NonNullable<OsmPbfHeaderBlock["bbox"]>, out: Pbf) => {
				out.writeSVarintField(1, bbox.left)
				out.writeSVarintField(2, bbox.right)
				out.writeSVarintField(3, bbox.top)
				out.writeSVarintField(4, bbox.bottom)
			},
			header.bbox,
		)
	}
	for (const feature of header.required_features)
		pbf.writeStringField(4, feature)
	for (const feature of header.optional_features)
		pbf.writeStringField(5, feature)
	if (header.writingprogram) pbf.writeStringField(16, header.writingprogram)
	if (header.source) pbf.writeStringField(17, header.source)
}

export function encodeHeaderBlock(header: OsmPbfHeaderBlock) {
	const pbf = new Pbf()
	writeHeaderBlock(header, pbf)
	return pbf.finish()
}

function writeInfo(info: OsmPbfInfo, pbf: Pbf) {
	if (info.version !== undefined) pbf.writeVarintField(1, info.version)
	if (info.timestamp !== undefined) pbf.writeVarintField(2, info.timestamp)
	if (info.changeset !== undefined) pbf.writeVarintField(3, info.changeset)
	if (info.uid !== undefined) pbf.writeVarintField(4, info.uid)
	if (info.user_sid !== undefined) pbf.writeVarintField(5, info.user_sid)
	if (info.visible !== undefined) pbf.writeBooleanField(6, info.visible)
}

function writeDenseInfo(info: OsmPbfDenseInfo, pbf: Pbf) {
	pbf.writePackedVarint(1, info.version)
	pbf.writePackedSVarint(2, info.timestamp)
	pbf.writePackedSVarint(3, info.changeset)
	pbf.writePackedSVarint(4, info.uid)
	pbf.writePackedSVarint(5, info.user_sid)
	pbf.writePackedBoolean(6, info.visible)
}

function writeDenseNodes(dense: OsmPbfDenseNodes, pbf: Pbf) {
	pbf.writePackedSVarint(1, dense.id)
	if (dense.denseinfo) pbf.writeMessage(5, writeDenseInfo, dense.denseinfo)
	pbf.writePackedSVarint(8, dense.lat)
	pbf.writePackedSVarint(9, dense.lon)
	pbf.writePackedVarint(10, dense.keys_vals)
}

function writeNode(node: OsmPbfNode, pbf: Pbf) {
	pbf.writeSVarintField(1, node.id)
	pbf.writePackedVarint(2, node.keys)
	pbf.writePackedVarint(3, node.vals)
	if (node.info) pbf.writeMessage(4, writeInfo, node.info)
	pbf.writeSVarintField(8, node.lat)
	pbf.writeSVarintField(9, node.lon)
}

function writeWay(way: OsmPbfWay, pbf: Pbf) {
	pbf.writeVarintField(1, way.id)
	pbf.writePackedVarint(2, way.keys)
	pbf.writePackedVarint(3, way.vals)
	if (way.info) pbf.writeMessage(4, writeInfo, way.info)
	pbf.writePackedSVarint(8, way.refs)
	pbf.writePackedSVarint(9, way.lat)
	pbf.writePackedSVarint(10, way.lon)
}

function writeRelation(relation: OsmPbfRelation, pbf: Pbf) {
	pbf.writeVarintField(1, relation.id)
	pbf.writePackedVarint(2, relation.keys)
	pbf.writePackedVarint(3, relation.vals)
	if (relation.info) pbf.writeMessage(4, writeInfo, relation.info)
	pbf.writePackedVarint(8, relation.roles_sid)
	pbf.writePackedSVarint(9, relation.memids)
	pbf.writePackedVarint(10, relation.types)
}

function writeGroup(group: OsmPbfGroup, pbf: Pbf) {
	for (const node of group.nodes) pbf.writeMessage(1, writeNode, node)
	if (group.dense) pbf.writeMessage(2, writeDenseNodes, group.dense)
	for (const way of group.ways) pbf.writeMessage(3, writeWay, way)
	for (const relation of group.relations)
		pbf.writeMessage(4, writeRelation, relation)
	for (const changeset of group.changesets) {
		pbf.writeMessage(
			5,
			(value: { id: number }, out: Pbf) => out.writeVarintField(1, value.id),
			changeset,
		)
	}
}

function writePrimitiveBlock(block: OsmPbfBlock, pbf: Pbf) {
	pbf.writeMessage(
		1,
		(stringtable: Uint8Array[], out: Pbf) => {
			for (const bytes of stringtable) out.writeBytesField(1, bytes)
		},
		block.stringtable,
	)
	for (const group of block.primitivegroup) pbf.writeMessage(2, writeGroup, group)
	if (block.granularity !== 100) pbf.writeVarintField(17, block.granularity)
	if (block.date_granularity !== 1_000)
		pbf.writeVarintField(18, block.date_granularity)
	if (block.lat_offset !== 0) pbf.writeVarintField(19, block.lat_offset)
	if (block.lon_offset !== 0) pbf.writeVarintField(20, block.lon_offset)
}

export function encodePrimitiveBlock(block: OsmPbfBlock) {
	const pbf = new Pbf()
	writePrimitiveBlock(block, pbf)
	return pbf.finish()
}

export function createGroup(group: Partial<OsmPbfGroup> = {}): OsmPbfGroup {
	return { nodes: [], ways: [], relations: [], changesets: [], ...group }
}

export function createBlock(block: Partial<OsmPbfBlock> = {}): OsmPbfBlock {
	return {
		stringtable: [],
		primitivegroup: [],
		granularity: 100,
		lat_offset: 0,
		lon_offset: 0,
		date_granularity: 1_000,
		...block,
	}
}

export function stringTable(...strings: string[]) {
	return strings.map((s) => encoder.encode(s))
}

export function createSampleHeader(): OsmPbfHeaderBlock {
	return {
		bbox: { left: -1_000, right: 2_000, top: 3_000, bottom: -4_000 },
		required_features: ["OsmSchema-V0.6", "DenseNodes"],
		optional_features: ["Sort.Type_then_ID"],
		writingprogram: "pbfstream-tests",
	}
}

export function createSamplePrimitiveBlock(): OsmPbfBlock {
	return createBlock({
		stringtable: stringTable("", "name", "cafe", "amenity", "bench"),
		primitivegroup: [
			createGroup({
				dense: {
					id: [1, 1],
					lat: [1_000, 500],
					lon: [1_500, -600],
					keys_vals: [1, 2, 0, 3, 4, 0],
				},
			}),
			createGroup({
				ways: [
					{
						id: 10,
						keys: [3],
						vals: [4],
						refs: [1, 1],
						lat: [],
						lon: [],
					},
				],
			}),
		],
	})
}

/**
 * A file with a zlib compressed header block and a raw primitive block.
 */
export function createSamplePbfFileBytes() {
	const header = createSampleHeader()
	const primitiveBlock = createSamplePrimitiveBlock()
	return {
		header,
		primitiveBlock,
		fileBytes: concatBytes(
			frame("OSMHeader", zlibBlob(encodeHeaderBlock(header))),
			frame("OSMData", rawBlob(encodePrimitiveBlock(primitiveBlock))),
		),
	}
}

/**
 * Split bytes into chunks of the given sizes, with the remainder last.
 */
export function chunk(bytes: Uint8Array, ...sizes: number[]) {
	const chunks: Uint8Array[] = []
	let offset = 0
	for (const size of sizes) {
		chunks.push(bytes.slice(offset, offset + size))
		offset += size
	}
	if (offset < bytes.length) chunks.push(bytes.slice(offset))
	return chunks
}
