/**
 * Pruning passes for boundaries that are represented twice.
 * @module
 */

import { type GeometryEngine, turfGeometry } from "@tidemark/shared/geometry"
import { consoleLogger } from "@tidemark/shared/log"
import { geometryToWkt } from "@tidemark/shared/wkt"
import type {
	InterchangeCollection,
	InterchangeFeature,
} from "@tidemark/geojson/types"
import type { LineString, Polygon } from "geojson"
import type { GeometryOptions, PruneResult } from "./types"
import {
	featureCollection,
	isLineFeature,
	isPolygonFeature,
	Rejections,
} from "./utils"

/**
 * Polygon features of the collection whose geometry is well formed. The others are rejected.
 */
function validPolygons(
	collection: InterchangeCollection,
	rejections: Rejections,
): InterchangeFeature<Polygon>[] {
	return collection.features
		.filter(isPolygonFeature)
		.filter((feature) => rejections.run(feature, () => geometryToWkt(feature.geometry)).ok)
}

/**
 * `line` lies on the boundary of `polygon`: covered by it without reaching its interior.
 */
function runsAlongBoundary(
	engine: GeometryEngine,
	polygon: Polygon,
	line: LineString,
) {
	return engine.covers(polygon, line) && !engine.contains(polygon, line)
}

function pruneResult(
	collection: InterchangeCollection,
	removed: Set<InterchangeFeature>,
	rejections: Rejections,
): PruneResult {
	return {
		kept: featureCollection(
			collection.features.filter(
				(feature) => !removed.has(feature) && !rejections.has(feature),
			),
		),
		removed: featureCollection([...removed]),
		rejected: rejections.toCollection(),
	}
}

/**
 * Drop every line that runs along a polygon boundary: some polygon covers it but does not contain it.
 *
 * Lines reaching into a polygon's interior, even ones ending on its boundary, and lines outside every polygon, are
 * kept. Other features keep their order and
 * ids. Features with malformed geometry are rejected.
 */
export function pruneCoveredLines(
	collection: InterchangeCollection,
	options: Partial<GeometryOptions> = {},
): PruneResult {
	const log = options.logger ?? consoleLogger
	const engine = options.geometry ?? turfGeometry
	const rejections = new Rejections("Line pruning", log)
	const polygons = validPolygons(collection, rejections)
	const removed = new Set<InterchangeFeature>()

	for (const line of collection.features.filter(isLineFeature)) {
		const covering = rejections.run(line, () => {
			geometryToWkt(line.geometry)
			return polygons.find(
				(polygon) =>
					runsAlongBoundary(engine, polygon.geometry, line.geometry),
			)
		})
		if (!covering.ok || covering.value === undefined) continue
		removed.add(line)
		log(
			`Pruning line ${String(line.id)}: runs along polygon ${String(covering.value.id)}`,
			"debug",
		)
	}

	log(`Pruned ${removed.size} lines covered by polygon boundaries`, "info")
	return pruneResult(collection, removed, rejections)
}

/**
 * Drop single-ring polygons that duplicate an inner ring of another polygon: their outer ring runs along that inner
 * ring. Polygons lying inside the hole, touching it or not, are kept.
 *
 * Other features keep their order and ids. Features with malformed geometry are rejected.
 */
export function pruneInnerRings(
	collection: InterchangeCollection,
	options: Partial<GeometryOptions> = {},
): PruneResult {
	const log = options.logger ?? consoleLogger
	const engine = options.geometry ?? turfGeometry
	const rejections = new Rejections("Inner ring pruning", log)
	const polygons = validPolygons(collection, rejections)
	const candidates = polygons.filter(
		(polygon) => polygon.geometry.coordinates.length === 1,
	)
	const removed = new Set<InterchangeFeature>()

	for (const holder of polygons) {
		const [, ...innerRings] = holder.geometry.coordinates
		for (const [index, ring] of innerRings.entries()) {
			const hole: Polygon = { type: "Polygon", coordinates: [ring] }
			rejections.run(holder, () => {
				for (const candidate of candidates) {
					if (removed.has(candidate)) continue
					const outline: LineString = {
						type: "LineString",
						coordinates: candidate.geometry.coordinates[0] ?? [],
					}
					if (runsAlongBoundary(engine, hole, outline)) {
						removed.add(candidate)
						log(
							`Pruning polygon ${String(candidate.id)}: duplicates inner ring ${index} of polygon ${String(holder.id)}`,
							"debug",
						)
					}
				}
			})
			if (rejections.has(holder)) break
		}
	}

	log(`Pruned ${removed.size} polygons duplicating inner rings`, "info")
	return pruneResult(collection, removed, rejections)
}
