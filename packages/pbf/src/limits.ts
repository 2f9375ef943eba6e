// Recommended and maximum header and blob sizes as defined by the OSM PBF format
// Header: 32 KiB and 64 KiB
export const RECOMMENDED_HEADER_SIZE_BYTES = 32 * 1024
export const MAX_HEADER_SIZE_BYTES = 64 * 1024
// Blob: 16 MiB and 32 MiB, for both the framed and the uncompressed size
export const RECOMMENDED_BLOB_SIZE_BYTES = 16 * 1024 * 1024
export const MAX_BLOB_SIZE_BYTES = 32 * 1024 * 1024

/** Number of bytes used to encode the BlobHeader length prefix (big-endian int32). */
export const HEADER_LENGTH_BYTES = 4

/** `BlobHeader.type` of the file header block. */
export const OSM_HEADER_TYPE = "OSMHeader"
/** `BlobHeader.type` of primitive (data) blocks. */
export const OSM_DATA_TYPE = "OSMData"
