export type LonLat = [lon: number, lat: number]
export type LatLon = [lat: number, lon: number]

/**
 * A bounding box in the format [minLon, minLat, maxLon, maxLat].
 * GeoJSON.BBox allows for 3D bounding boxes, but the interchange format only carries 2D boxes.
 */
export type GeoBbox2D = [
	minLon: number,
	minLat: number,
	maxLon: number,
	maxLat: number,
]

/**
 * Tags are always stored as strings. Numbers coming from upstream decoders are stringified on insert.
 */
export interface GeoTags {
	[key: string]: string
}

export type GeoEntityType = "point" | "line" | "polygon"
