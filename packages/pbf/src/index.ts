/**
 * @pbfstream/pbf - Streaming OpenStreetMap PBF decoding.
 *
 * Splits a PBF byte stream into blobs, decompresses and decodes them into
 * header and primitive blocks, and unpacks the compact encodings inside those
 * blocks. Stays close to the protobuf schema (`osmformat.proto`,
 * `fileformat.proto`) and leaves entity assembly to the caller.
 *
 * Key capabilities:
 * - **Frame**: Read raw blobs from a byte source, file, buffer or stream.
 * - **Decode**: Decompress blobs into a reusable buffer and decode blocks.
 * - **Unpack**: Delta coded columns, dense nodes and string table tags.
 * - **Normalize**: Convert encoded coordinates and timestamps to real units.
 *
 * @example
 * ```ts
 * import { DenseNodeReader, fileSource, normalizeCoord, readOsmPbf } from "@pbfstream/pbf"
 *
 * for (const parsed of readOsmPbf(fileSource("./monaco.osm.pbf"))) {
 *   if (parsed.type !== "primitive") continue
 *   for (const group of parsed.block.primitivegroup) {
 *     if (!group.dense) continue
 *     for (const node of new DenseNodeReader(group.dense)) {
 *       if (node.ok) console.log(normalizeCoord(node.value.lat, node.value.lon, parsed.block))
 *     }
 *   }
 * }
 * ```
 *
 * @module @pbfstream/pbf
 */

export * from "./blobs-to-blocks"
export * from "./byte-source"
export * from "./decompress"
export * from "./delta"
export * from "./dense-nodes"
export * from "./errors"
export * from "./limits"
export * from "./normalize"
export * from "./pbf-to-blobs"
export * from "./proto/fileformat"
export * from "./proto/osmformat"
export * from "./read"
export * from "./tags"
export * from "./utils"
