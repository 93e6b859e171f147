/**
 * Bounding box helpers. Boxes are `[minLon, minLat, maxLon, maxLat]`; an empty input yields `null`.
 * @module
 */

import type { GeoBbox2D, LonLat } from "./types"

/**
 * Check if two bboxes overlap. Edges are inclusive, so boxes that only touch on an edge or corner overlap.
 */
export function bboxOverlaps(bb1: GeoBbox2D, bb2: GeoBbox2D) {
	return (
		bb1[0] <= bb2[2] && bb1[2] >= bb2[0] && bb1[1] <= bb2[3] && bb1[3] >= bb2[1]
	)
}

/**
 * Compute the bounding box of a set of coordinates.
 */
export function bboxFromLonLats(lonLats: Iterable<LonLat>): GeoBbox2D | null {
	let bbox: GeoBbox2D | null = null
	for (const [lon, lat] of lonLats) bbox = extendBbox(bbox, lon, lat)
	return bbox
}

/**
 * Grow `bbox` to include a coordinate. Mutates and returns `bbox`, or creates a new one when it is `null`.
 */
export function extendBbox(
	bbox: GeoBbox2D | null,
	lon: number,
	lat: number,
): GeoBbox2D {
	if (bbox === null) return [lon, lat, lon, lat]
	if (lon < bbox[0]) bbox[0] = lon
	if (lat < bbox[1]) bbox[1] = lat
	if (lon > bbox[2]) bbox[2] = lon
	if (lat > bbox[3]) bbox[3] = lat
	return bbox
}

/**
 * Aggregate min/max over several bboxes, skipping `null` entries.
 */
export function mergeBboxes(
	bboxes: Iterable<GeoBbox2D | null>,
): GeoBbox2D | null {
	let merged: GeoBbox2D | null = null
	for (const bbox of bboxes) {
		if (bbox === null) continue
		if (merged === null) {
			merged = [...bbox]
			continue
		}
		extendBbox(merged, bbox[0], bbox[1])
		extendBbox(merged, bbox[2], bbox[3])
	}
	return merged
}
