/**
 * Interchange-to-graph conversion.
 *
 * The full read rebuilds every point, deduplicated by id, so features sharing a point id share one `Point` with
 * back-references to all of them. The fast read keeps only each feature's geometry.
 *
 * @module
 */

import { Graph, type PointRecord } from "@tidemark/core"
import { validateLatLon } from "@tidemark/shared/coordinates"
import { ValidationError } from "@tidemark/shared/errors"
import { consoleLogger } from "@tidemark/shared/log"
import type { Position } from "geojson"
import type {
	InterchangeCollection,
	InterchangeData,
	InterchangeFeature,
	ReadOptions,
} from "./types"
import {
	extractFeatureId,
	flatIdNodes,
	parseFeatureCollection,
	ringIdNodes,
} from "./utils"

/**
 * Pair coordinates with their point ids, validating both.
 * @returns The point records, or a reason the ring cannot be read.
 */
function toPointRecords(
	coordinates: Position[],
	ids: number[],
): PointRecord[] | string {
	if (coordinates.length !== ids.length)
		return `${coordinates.length} coordinates but ${ids.length} id_nodes`
	const records: PointRecord[] = []
	for (let i = 0; i < coordinates.length; i++) {
		const [lon, lat] = coordinates[i] ?? []
		const id = ids[i]
		if (lon === undefined || lat === undefined || id === undefined)
			return `invalid position at index ${i}`
		try {
			validateLatLon(lat, lon)
		} catch (error) {
			if (error instanceof ValidationError) return error.message
			throw error
		}
		records.push({ id, lon, lat })
	}
	return records
}

/**
 * Build a graph from an interchange document, reconstructing every point.
 *
 * - **Point** features become registry points (tags are merged into an existing point with the same id).
 * - **LineString** features become lines over their `id_nodes`.
 * - **Polygon** features become polygons, the first ring being the outer ring.
 *
 * A feature whose coordinate count and `id_nodes` count disagree (for polygons, in any ring), or whose coordinates are
 * out of range, is skipped with a warning. So are features without a numeric id and multi-geometries.
 *
 * @example
 * ```ts
 * const graph = graphFromGeoJSON(await readFile("./coast.geojson", "utf-8"), { id: "coast" })
 * graph.lines.search("natural", "coastline")
 * ```
 */
export function graphFromGeoJSON(
	data: InterchangeData | InterchangeCollection,
	options: Partial<ReadOptions> = {},
): Graph {
	const log = options.logger ?? consoleLogger
	const graph = new Graph({ id: options.id, logger: log })
	const collection = parseFeatureCollection(data, options.id)

	collection.features.forEach((feature, index) => {
		const id = extractFeatureId(feature.id)
		if (id === undefined) {
			log(`Skipping feature ${index}: no numeric id (${String(feature.id)})`, "warn")
			return
		}
		try {
			const skipped = addFeature(graph, id, feature)
			if (skipped) log(`Skipping ${feature.geometry.type} ${id}: ${skipped}`, "warn")
		} catch (error) {
			if (!(error instanceof ValidationError)) throw error
			log(`Skipping ${feature.geometry.type} ${id}: ${error.message}`, "warn")
		}
	})

	log(
		`Read ${graph.points.size} points, ${graph.lines.size} lines and ${graph.polygons.size} polygons`,
		"debug",
	)
	return graph
}

/**
 * Add one feature to the graph.
 * @returns Why the feature was skipped, or `null` when it was added.
 */
function addFeature(
	graph: Graph,
	id: number,
	{ geometry, properties }: InterchangeFeature,
): string | null {
	const tags = properties.tags ?? {}
	switch (geometry.type) {
		case "Point": {
			const records = toPointRecords([geometry.coordinates], [id])
			if (typeof records === "string") return records
			const existing = graph.points.get(id)
			if (existing) {
				for (const [key, value] of Object.entries(tags)) existing.addTag(key, value)
				return null
			}
			for (const record of records) graph.points.addPoint({ ...record, tags })
			return null
		}
		case "LineString": {
			const ids = flatIdNodes(properties.id_nodes)
			if (ids === undefined) return "missing or nested id_nodes"
			const points = toPointRecords(geometry.coordinates, ids)
			if (typeof points === "string") return points
			graph.addLineRecord({ id, points, tags })
			return null
		}
		case "Polygon": {
			const idRings = ringIdNodes(properties.id_nodes)
			if (idRings === undefined || idRings.length !== geometry.coordinates.length)
				return `${geometry.coordinates.length} rings but ${idRings?.length ?? 0} id_nodes rings`
			const rings: PointRecord[][] = []
			for (const [ringIndex, ring] of geometry.coordinates.entries()) {
				const points = toPointRecords(ring, idRings[ringIndex] ?? [])
				if (typeof points === "string") return `ring ${ringIndex} has ${points}`
				rings.push(points)
			}
			const [outer = [], ...inner] = rings
			graph.addPolygonRecord({ id, outer, inner, tags })
			return null
		}
		default:
			return "unsupported geometry"
	}
}

/**
 * Build a graph holding only geometry handles: lines and polygons without points, and an empty point registry.
 *
 * Meant for consumers that only run geometric predicates (e.g. `Polygons.containing`) and never traverse the graph.
 */
export function graphFromGeoJSONFast(
	data: InterchangeData | InterchangeCollection,
	options: Partial<ReadOptions> = {},
): Graph {
	const log = options.logger ?? consoleLogger
	const graph = new Graph({ id: options.id, logger: log })
	const collection = parseFeatureCollection(data, options.id)

	collection.features.forEach((feature, index) => {
		const id = extractFeatureId(feature.id)
		if (id === undefined) {
			log(`Skipping feature ${index}: no numeric id (${String(feature.id)})`, "warn")
			return
		}
		const { geometry, properties } = feature
		const tags = properties.tags ?? {}
		try {
			if (geometry.type === "LineString")
				graph.lines.addLine({ id, tags, geometry })
			else if (geometry.type === "Polygon")
				graph.polygons.addPolygon({ id, tags, geometry })
			else log(`Skipping ${geometry.type} ${id}: no geometry handle`, "debug")
		} catch (error) {
			if (!(error instanceof ValidationError)) throw error
			log(`Skipping ${geometry.type} ${id}: ${error.message}`, "warn")
		}
	})
	return graph
}
