import type { OsmPbfBlockSettings } from "./proto/osmformat"

/**
 * Convert encoded coordinates to nanodegrees using the block's granularity
 * and offsets. Divide by 1e9 for degrees.
 */
export function normalizeCoord(
	lat: number,
	lon: number,
	block: OsmPbfBlockSettings,
): [lat: number, lon: number] {
	return [
		lat * block.granularity + block.lat_offset,
		lon * block.granularity + block.lon_offset,
	]
}

/**
 * Convert an encoded timestamp to milliseconds since the Unix epoch.
 */
export function normalizeTimestamp(
	timestamp: number,
	block: OsmPbfBlockSettings,
): number {
	return timestamp * block.date_granularity
}
