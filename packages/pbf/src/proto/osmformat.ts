/**
 * Readers for `osmformat.proto`: header blocks, primitive blocks and the
 * entities they contain.
 *
 * Field names follow the schema. Packed columns are decoded to plain number
 * arrays; 64-bit integers are read as JavaScript numbers, which is exact for
 * every value below 2^53.
 *
 * @module
 */

import type Pbf from "pbf"
import { readEmbedded } from "./decode"

export interface OsmPbfHeaderBBox {
	left: number
	right: number
	top: number
	bottom: number
}

export interface OsmPbfHeaderBlock {
	bbox?: OsmPbfHeaderBBox
	required_features: string[]
	optional_features: string[]
	writingprogram?: string
	source?: string
	osmosis_replication_timestamp?: number
	osmosis_replication_sequence_number?: number
	osmosis_replication_base_url?: string
}

/**
 * Block-scoped string table. Index 0 is conventionally the empty string and
 * is never a real key or value.
 */
export type OsmPbfStringTable = Uint8Array[]

/** Scaling constants that convert a block's integers to real units. */
export interface OsmPbfBlockSettings {
	/** Coordinate granularity in nanodegrees. Defaults to 100. */
	granularity: number
	/** Latitude offset in nanodegrees. Defaults to 0. */
	lat_offset: number
	/** Longitude offset in nanodegrees. Defaults to 0. */
	lon_offset: number
	/** Timestamp granularity in milliseconds. Defaults to 1000. */
	date_granularity: number
}

export interface OsmPbfBlock extends OsmPbfBlockSettings {
	stringtable: OsmPbfStringTable
	primitivegroup: OsmPbfGroup[]
}

export interface OsmPbfGroup {
	nodes: OsmPbfNode[]
	dense?: OsmPbfDenseNodes
	ways: OsmPbfWay[]
	relations: OsmPbfRelation[]
	changesets: OsmPbfChangeSet[]
}

export interface OsmPbfInfo {
	version?: number
	timestamp?: number
	changeset?: number
	uid?: number
	user_sid?: number
	visible?: boolean
}

/** Delta coded metadata columns, parallel to the dense node ids. */
export interface OsmPbfDenseInfo {
	version: number[]
	timestamp: number[]
	changeset: number[]
	uid: number[]
	user_sid: number[]
	visible: boolean[]
}

export interface OsmPbfDenseNodes {
	id: number[]
	denseinfo?: OsmPbfDenseInfo
	lat: number[]
	lon: number[]
	/** Per node runs of key/value string indexes, each terminated by a single 0. */
	keys_vals: number[]
}

export interface OsmPbfNode {
	id: number
	keys: number[]
	vals: number[]
	info?: OsmPbfInfo
	lat: number
	lon: number
}

export interface OsmPbfWay {
	id: number
	keys: number[]
	vals: number[]
	info?: OsmPbfInfo
	/** Delta coded node ids. */
	refs: number[]
	/** Delta coded node latitudes, when the file has the LocationsOnWays feature. */
	lat: number[]
	lon: number[]
}

export const MEMBER_TYPES = ["node", "way", "relation"] as const

export type OsmPbfMemberType = (typeof MEMBER_TYPES)[number]

export interface OsmPbfRelation {
	id: number
	keys: number[]
	vals: number[]
	info?: OsmPbfInfo
	roles_sid: number[]
	/** Delta coded member ids. */
	memids: number[]
	/** Indexes into `MEMBER_TYPES`. */
	types: number[]
}

export interface OsmPbfChangeSet {
	id: number
}

// Header block

function readHeaderBBoxField(tag: number, bbox: OsmPbfHeaderBBox, pbf: Pbf) {
	if (tag === 1) bbox.left = pbf.readSVarint()
	else if (tag === 2) bbox.right = pbf.readSVarint()
	else if (tag === 3) bbox.top = pbf.readSVarint()
	else if (tag === 4) bbox.bottom = pbf.readSVarint()
}

export function readHeaderBBox(pbf: Pbf, end?: number): OsmPbfHeaderBBox {
	const bbox: OsmPbfHeaderBBox = { left: 0, right: 0, top: 0, bottom: 0 }
	return pbf.readFields(readHeaderBBoxField, bbox, end)
}

function readHeaderBlockField(
	tag: number,
	header: OsmPbfHeaderBlock,
	pbf: Pbf,
) {
	if (tag === 1) header.bbox = readEmbedded(pbf, readHeaderBBox)
	else if (tag === 4) header.required_features.push(pbf.readString())
	else if (tag === 5) header.optional_features.push(pbf.readString())
	else if (tag === 16) header.writingprogram = pbf.readString()
	else if (tag === 17) header.source = pbf.readString()
	else if (tag === 32)
		header.osmosis_replication_timestamp = pbf.readVarint(true)
	else if (tag === 33)
		header.osmosis_replication_sequence_number = pbf.readVarint(true)
	else if (tag === 34) header.osmosis_replication_base_url = pbf.readString()
}

export function readHeaderBlock(pbf: Pbf, end?: number): OsmPbfHeaderBlock {
	const header: OsmPbfHeaderBlock = {
		required_features: [],
		optional_features: [],
	}
	return pbf.readFields(readHeaderBlockField, header, end)
}

// Primitive block

function readStringTableField(
	tag: number,
	stringtable: OsmPbfStringTable,
	pbf: Pbf,
) {
	// Copy out of the decode buffer, which is reused for the next block.
	if (tag === 1) stringtable.push(pbf.readBytes().slice())
}

export function readStringTable(pbf: Pbf, end?: number): OsmPbfStringTable {
	const stringtable: OsmPbfStringTable = []
	return pbf.readFields(readStringTableField, stringtable, end)
}

function readInfoField(tag: number, info: OsmPbfInfo, pbf: Pbf) {
	if (tag === 1) info.version = pbf.readVarint(true)
	else if (tag === 2) info.timestamp = pbf.readVarint(true)
	else if (tag === 3) info.changeset = pbf.readVarint(true)
	else if (tag === 4) info.uid = pbf.readVarint(true)
	else if (tag === 5) info.user_sid = pbf.readVarint()
	else if (tag === 6) info.visible = pbf.readBoolean()
}

export function readInfo(pbf: Pbf, end?: number): OsmPbfInfo {
	const info: OsmPbfInfo = {}
	return pbf.readFields(readInfoField, info, end)
}

function readDenseInfoField(tag: number, info: OsmPbfDenseInfo, pbf: Pbf) {
	if (tag === 1) pbf.readPackedVarint(info.version, true)
	else if (tag === 2) pbf.readPackedSVarint(info.timestamp)
	else if (tag === 3) pbf.readPackedSVarint(info.changeset)
	else if (tag === 4) pbf.readPackedSVarint(info.uid)
	else if (tag === 5) pbf.readPackedSVarint(info.user_sid)
	else if (tag === 6) pbf.readPackedBoolean(info.visible)
}

export function readDenseInfo(pbf: Pbf, end?: number): OsmPbfDenseInfo {
	const info: OsmPbfDenseInfo = {
		version: [],
		timestamp: [],
		changeset: [],
		uid: [],
		user_sid: [],
		visible: [],
	}
	return pbf.readFields(readDenseInfoField, info, end)
}

function readDenseNodesField(tag: number, dense: OsmPbfDenseNodes, pbf: Pbf) {
	if (tag === 1) pbf.readPackedSVarint(dense.id)
	else if (tag === 5) dense.denseinfo = readEmbedded(pbf, readDenseInfo)
	else if (tag === 8) pbf.readPackedSVarint(dense.lat)
	else if (tag === 9) pbf.readPackedSVarint(dense.lon)
	else if (tag === 10) pbf.readPackedVarint(dense.keys_vals, true)
}

export function readDenseNodes(pbf: Pbf, end?: number): OsmPbfDenseNodes {
	const dense: OsmPbfDenseNodes = { id: [], lat: [], lon: [], keys_vals: [] }
	return pbf.readFields(readDenseNodesField, dense, end)
}

function readNodeField(tag: number, node: OsmPbfNode, pbf: Pbf) {
	if (tag === 1) node.id = pbf.readSVarint()
	else if (tag === 2) pbf.readPackedVarint(node.keys)
	else if (tag === 3) pbf.readPackedVarint(node.vals)
	else if (tag === 4) node.info = readEmbedded(pbf, readInfo)
	else if (tag === 8) node.lat = pbf.readSVarint()
	else if (tag === 9) node.lon = pbf.readSVarint()
}

export function readNode(pbf: Pbf, end?: number): OsmPbfNode {
	const node: OsmPbfNode = { id: 0, keys: [], vals: [], lat: 0, lon: 0 }
	return pbf.readFields(readNodeField, node, end)
}

function readWayField(tag: number, way: OsmPbfWay, pbf: Pbf) {
	if (tag === 1) way.id = pbf.readVarint(true)
	else if (tag === 2) pbf.readPackedVarint(way.keys)
	else if (tag === 3) pbf.readPackedVarint(way.vals)
	else if (tag === 4) way.info = readEmbedded(pbf, readInfo)
	else if (tag === 8) pbf.readPackedSVarint(way.refs)
	else if (tag === 9) pbf.readPackedSVarint(way.lat)
	else if (tag === 10) pbf.readPackedSVarint(way.lon)
}

export function readWay(pbf: Pbf, end?: number): OsmPbfWay {
	const way: OsmPbfWay = {
		id: 0,
		keys: [],
		vals: [],
		refs: [],
		lat: [],
		lon: [],
	}
	return pbf.readFields(readWayField, way, end)
}

function readRelationField(tag: number, relation: OsmPbfRelation, pbf: Pbf) {
	if (tag === 1) relation.id = pbf.readVarint(true)
	else if (tag === 2) pbf.readPackedVarint(relation.keys)
	else if (tag === 3) pbf.readPackedVarint(relation.vals)
	else if (tag === 4) relation.info = readEmbedded(pbf, readInfo)
	else if (tag === 8) pbf.readPackedVarint(relation.roles_sid, true)
	else if (tag === 9) pbf.readPackedSVarint(relation.memids)
	else if (tag === 10) pbf.readPackedVarint(relation.types)
}

export function readRelation(pbf: Pbf, end?: number): OsmPbfRelation {
	const relation: OsmPbfRelation = {
		id: 0,
		keys: [],
		vals: [],
		roles_sid: [],
		memids: [],
		types: [],
	}
	return pbf.readFields(readRelationField, relation, end)
}

function readChangeSetField(tag: number, changeset: OsmPbfChangeSet, pbf: Pbf) {
	if (tag === 1) changeset.id = pbf.readVarint(true)
}

export function readChangeSet(pbf: Pbf, end?: number): OsmPbfChangeSet {
	const changeset: OsmPbfChangeSet = { id: 0 }
	return pbf.readFields(readChangeSetField, changeset, end)
}

function readGroupField(tag: number, group: OsmPbfGroup, pbf: Pbf) {
	if (tag === 1) group.nodes.push(readEmbedded(pbf, readNode))
	else if (tag === 2) group.dense = readEmbedded(pbf, readDenseNodes)
	else if (tag === 3) group.ways.push(readEmbedded(pbf, readWay))
	else if (tag === 4) group.relations.push(readEmbedded(pbf, readRelation))
	else if (tag === 5) group.changesets.push(readEmbedded(pbf, readChangeSet))
}

export function readPrimitiveGroup(pbf: Pbf, end?: number): OsmPbfGroup {
	const group: OsmPbfGroup = {
		nodes: [],
		ways: [],
		relations: [],
		changesets: [],
	}
	return pbf.readFields(readGroupField, group, end)
}

function readPrimitiveBlockField(tag: number, block: OsmPbfBlock, pbf: Pbf) {
	if (tag === 1) block.stringtable = readEmbedded(pbf, readStringTable)
	else if (tag === 2)
		block.primitivegroup.push(readEmbedded(pbf, readPrimitiveGroup))
	else if (tag === 17) block.granularity = pbf.readVarint(true)
	else if (tag === 18) block.date_granularity = pbf.readVarint(true)
	else if (tag === 19) block.lat_offset = pbf.readVarint(true)
	else if (tag === 20) block.lon_offset = pbf.readVarint(true)
}

/**
 * Read a primitive block, filling in the schema defaults for the block
 * settings that are absent.
 */
export function readPrimitiveBlock(pbf: Pbf, end?: number): OsmPbfBlock {
	const block: OsmPbfBlock = {
		stringtable: [],
		primitivegroup: [],
		granularity: 100,
		lat_offset: 0,
		lon_offset: 0,
		date_granularity: 1_000,
	}
	return pbf.readFields(readPrimitiveBlockField, block, end)
}
