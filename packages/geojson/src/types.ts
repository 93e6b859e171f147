/**
 * Interchange format types.
 *
 * A FeatureCollection whose features carry a numeric `id`, a standard `bbox` of `[minLon, minLat, maxLon, maxLat]`,
 * and `properties` holding the entity `tags` plus `id_nodes`: the point ids parallel to the geometry coordinates
 * (one array per ring for polygons).
 *
 * @module
 */

import type { Point as GraphPoint } from "@tidemark/core"
import type { Logger } from "@tidemark/shared/log"
import type { GeoTags } from "@tidemark/shared/types"
import type {
	Feature,
	FeatureCollection,
	LineString,
	MultiLineString,
	MultiPoint,
	MultiPolygon,
	Point,
	Polygon,
} from "geojson"

export interface InterchangeProperties {
	/** Entity tags. */
	tags?: GeoTags
	/** Point ids parallel to the coordinates; one array per ring for polygons. */
	id_nodes?: number[] | number[][]
	[key: string]: unknown
}

/**
 * Geometries an interchange document may hold. Only `Point`, `LineString` and `Polygon` map onto graph entities. The
 * merge engine deduplicates multi-geometries and otherwise passes them through.
 */
export type InterchangeGeometry =
	| Point
	| MultiPoint
	| LineString
	| MultiLineString
	| Polygon
	| MultiPolygon

export type InterchangeFeature<G extends InterchangeGeometry = InterchangeGeometry> =
	Feature<G, InterchangeProperties>

export type InterchangeCollection<
	G extends InterchangeGeometry = InterchangeGeometry,
> = FeatureCollection<G, InterchangeProperties>

/**
 * Input accepted by `parseFeatureCollection`: JSON text, UTF-8 bytes, or an already-parsed object.
 */
export type InterchangeData = string | Uint8Array | ArrayBuffer | object

export interface ReadOptions {
	/** Graph id, usually the file name. */
	id: string
	logger: Logger
}

export interface WriteOptions {
	logger: Logger
	/** Points written as Point features in addition to the isolated registry points. */
	extraPoints: Iterable<GraphPoint>
}
