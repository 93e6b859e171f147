/**
 * Graph-to-interchange conversion.
 * @module
 */

import type { Graph, Line, Point, Polygon } from "@tidemark/core"
import { bboxFromLonLats } from "@tidemark/shared/bbox"
import { ValidationError } from "@tidemark/shared/errors"
import { consoleLogger, type Logger } from "@tidemark/shared/log"
import type { LonLat } from "@tidemark/shared/types"
import type {
	LineString,
	Point as GeoJSONPoint,
	Polygon as GeoJSONPolygon,
	Position,
} from "geojson"
import type {
	InterchangeCollection,
	InterchangeFeature,
	WriteOptions,
} from "./types"

/**
 * Convert a point to a Point feature.
 */
export function pointToFeature(point: Point): InterchangeFeature<GeoJSONPoint> {
	return {
		type: "Feature",
		id: point.id,
		bbox: point.bbox(),
		geometry: {
			type: "Point",
			coordinates: point.lonLat(),
		},
		properties: {
			tags: point.tags.toObject(),
			id_nodes: [point.id],
		},
	}
}

/**
 * Convert a line to a LineString feature.
 *
 * A line read without points is written from its geometry handle, without `id_nodes`.
 *
 * @returns `null`, with a warning, when the line has fewer than 2 points.
 */
export function lineToFeature(
	line: Line,
	log: Logger = consoleLogger,
): InterchangeFeature<LineString> | null {
	const tags = line.tags.toObject()
	if (line.length === 0 && line.geometry) {
		return {
			type: "Feature",
			id: line.id,
			bbox: line.bbox() ?? undefined,
			geometry: line.geometry,
			properties: { tags },
		}
	}
	if (line.length < 2) {
		log(`Skipping line ${line.id}: ${line.length} points`, "warn")
		return null
	}
	const coordinates = line.coordinates("lonlat")
	return {
		type: "Feature",
		id: line.id,
		bbox: bboxFromLonLats(coordinates) ?? undefined,
		geometry: { type: "LineString", coordinates },
		properties: {
			tags,
			id_nodes: [...line.refs],
		},
	}
}

/**
 * Convert a polygon to a Polygon feature, outer ring first.
 *
 * Rings with fewer than 3 points are skipped with a warning (the whole polygon when it is the outer ring). Unclosed
 * rings are closed in the output by repeating their first point, also with a warning. The polygon itself is not
 * modified.
 *
 * @returns `null` when the outer ring is skipped.
 */
export function polygonToFeature(
	polygon: Polygon,
	log: Logger = consoleLogger,
): InterchangeFeature<GeoJSONPolygon> | null {
	const tags = polygon.tags.toObject()
	if (polygon.outer.length === 0 && polygon.geometry) {
		return {
			type: "Feature",
			id: polygon.id,
			bbox: polygon.bbox() ?? undefined,
			geometry: polygon.geometry,
			properties: { tags },
		}
	}

	const coordinates: Position[][] = []
	const idNodes: number[][] = []
	for (const [index, ring] of [polygon.outer, ...polygon.inner].entries()) {
		const label = index === 0 ? "outer ring" : `inner ring ${index - 1}`
		if (ring.length < 3) {
			if (index === 0) {
				log(
					`Skipping polygon ${polygon.id}: ${label} has ${ring.length} points`,
					"warn",
				)
				return null
			}
			log(
				`Skipping ${label} of polygon ${polygon.id}: ${ring.length} points`,
				"warn",
			)
			continue
		}
		const ids = [...ring]
		const first = ids[0]
		if (first !== undefined && first !== ids.at(-1)) {
			log(`Closing ${label} of polygon ${polygon.id}`, "warn")
			ids.push(first)
		}
		idNodes.push(ids)
		coordinates.push(polygon.ringPoints(ids).map((point) => point.lonLat()))
	}

	return {
		type: "Feature",
		id: polygon.id,
		bbox: bboxFromLonLats(coordinates.flat().map(lonLatOf)) ?? undefined,
		geometry: { type: "Polygon", coordinates },
		properties: {
			tags,
			id_nodes: idNodes,
		},
	}
}

function lonLatOf([lon = 0, lat = 0]: Position): LonLat {
	return [lon, lat]
}

/**
 * Convert a graph to an interchange FeatureCollection: lines, then polygons, then points.
 *
 * Points are written when no line or polygon uses them, plus every point in `options.extraPoints`; each id once.
 *
 * @throws ValidationError when the graph and `extraPoints` are both empty.
 */
export function graphToGeoJSON(
	graph: Graph,
	options: Partial<WriteOptions> = {},
): InterchangeCollection {
	const log = options.logger ?? consoleLogger
	const extraPoints = [...(options.extraPoints ?? [])]
	if (graph.isEmpty() && extraPoints.length === 0)
		throw new ValidationError(`Nothing to write: graph ${graph.id} is empty`)

	const features: InterchangeFeature[] = []
	for (const line of graph.lines) {
		const feature = lineToFeature(line, log)
		if (feature) features.push(feature)
	}
	log(`Converted ${graph.lines.size} lines`, "debug")

	for (const polygon of graph.polygons) {
		const feature = polygonToFeature(polygon, log)
		if (feature) features.push(feature)
	}
	log(`Converted ${graph.polygons.size} polygons`, "debug")

	const written = new Set<number>()
	const isolated = Array.from(graph.points).filter(
		(point) => point.lineIds.size === 0 && point.polygonIds.size === 0,
	)
	for (const point of [...isolated, ...extraPoints]) {
		if (written.has(point.id)) continue
		written.add(point.id)
		features.push(pointToFeature(point))
	}
	log(`Converted ${written.size} points`, "debug")

	return { type: "FeatureCollection", features }
}
