import { ValidationError } from "@tidemark/shared/errors"
import { turfGeometry } from "@tidemark/shared/geometry"
import { consoleLogger } from "@tidemark/shared/log"
import type {
	InterchangeCollection,
	InterchangeFeature,
	InterchangeProperties,
} from "@tidemark/geojson/types"
import type { Polygon } from "geojson"
import type { GeometryOptions } from "./types"
import { featureCollection, positionsBbox } from "./utils"

/**
 * Properties for a grid cell: everything but `id_nodes`, since the clipped rings have new vertices.
 */
function cellProperties(properties: InterchangeProperties): InterchangeProperties {
	const copy: InterchangeProperties = { ...properties }
	delete copy.id_nodes
	if (properties.tags) copy.tags = { ...properties.tags }
	return copy
}

function cell(lon: number, lat: number, size: number): Polygon {
	return {
		type: "Polygon",
		coordinates: [
			[
				[lon, lat],
				[lon + size, lat],
				[lon + size, lat + size],
				[lon, lat + size],
				[lon, lat],
			],
		],
	}
}

/**
 * Clip a Polygon feature against a square grid anchored at the minimum corner of its bbox.
 *
 * The grid has `ceil(width / cellSize)` columns and `ceil(height / cellSize)` rows. Each connected part of each
 * cell's intersection with a positive area becomes one Polygon feature, numbered from 1, column by column. Cells keep
 * the feature's properties without `id_nodes` and get their own bbox.
 *
 * @throws ValidationError when the feature is not a Polygon or `cellSize` is not a positive number.
 */
export function splitToGrid(
	feature: InterchangeFeature,
	cellSize: number,
	options: Partial<GeometryOptions> = {},
): InterchangeCollection<Polygon> {
	const log = options.logger ?? consoleLogger
	const engine = options.geometry ?? turfGeometry
	const { geometry } = feature
	if (geometry.type !== "Polygon")
		throw new ValidationError(
			`Grid split needs a Polygon feature, got ${geometry.type}`,
		)
	if (!(cellSize > 0) || !Number.isFinite(cellSize))
		throw new ValidationError(
			`Cell size must be a positive number, got ${cellSize}`,
		)

	const features: InterchangeFeature<Polygon>[] = []
	const bbox = positionsBbox(geometry.coordinates[0] ?? [])
	if (bbox === undefined) return featureCollection(features)

	const [minLon, minLat, maxLon, maxLat] = bbox
	const columns = Math.ceil((maxLon - minLon) / cellSize)
	const rows = Math.ceil((maxLat - minLat) / cellSize)
	for (let column = 0; column < columns; column++) {
		for (let row = 0; row < rows; row++) {
			const clip = cell(
				minLon + column * cellSize,
				minLat + row * cellSize,
				cellSize,
			)
			for (const part of engine.intersect(clip, geometry)) {
				if (engine.area(part) <= 0) continue
				features.push({
					type: "Feature",
					id: features.length + 1,
					bbox: positionsBbox(part.coordinates.flat()),
					geometry: part,
					properties: cellProperties(feature.properties),
				})
			}
		}
	}

	log(
		`Split feature ${String(feature.id)} into ${features.length} cells of ${cellSize}`,
		"debug",
	)
	return featureCollection(features)
}
