/**
 * Geofence export: finished line and polygon features as rows for a downstream store.
 *
 * A geofence row is a name, the axis-aligned rectangle around the feature and its WKT geometry. The store is
 * reached through the `GeofenceStore` interface; each row is written in its own transaction.
 *
 * @module
 */

import { errorMessage, ValidationError } from "@tidemark/shared/errors"
import { consoleLogger, type Logger } from "@tidemark/shared/log"
import type { GeoBbox2D } from "@tidemark/shared/types"
import { geometryToWkt } from "@tidemark/shared/wkt"
import type { InterchangeFeature } from "@tidemark/geojson/types"
import type { BBox } from "geojson"
import { featureTags, positionsBbox } from "./utils"

/**
 * Right-top and left-bottom corners of a geofence.
 */
export interface GeofenceRect {
	rtLat: number
	rtLon: number
	lbLat: number
	lbLon: number
}

export interface GeofenceRow {
	name: string
	rect: GeofenceRect
	wkt: string
}

/**
 * Transactional sink for geofence rows, such as a database connection.
 */
export interface GeofenceStore {
	begin(): Promise<void>
	/** Insert the geofence and return its id. */
	insertGeofence(row: { name: string; rect: GeofenceRect }): Promise<number>
	insertGeometry(geofenceId: number, wkt: string): Promise<void>
	commit(): Promise<void>
	rollback(): Promise<void>
}

export interface GeofenceLoadResult {
	loaded: { featureId: string | number | undefined; geofenceId: number }[]
	failed: { featureId: string | number | undefined; error: string }[]
}

function flatBbox(bbox: BBox): GeoBbox2D {
	if (bbox.length === 4) return bbox
	return [bbox[0], bbox[1], bbox[3], bbox[4]]
}

/**
 * Convert a LineString or Polygon feature to a geofence row.
 *
 * The name comes from `tags.name`, defaulting to `"Unnamed"`. The rectangle comes from the feature bbox, computed
 * from the coordinates when the feature has none.
 *
 * @throws ValidationError for other geometry types or malformed coordinates.
 */
export function featureToGeofence(feature: InterchangeFeature): GeofenceRow {
	const { geometry } = feature
	if (geometry.type !== "LineString" && geometry.type !== "Polygon")
		throw new ValidationError(
			`Geofences need a LineString or Polygon, got ${geometry.type}`,
		)
	const bbox = feature.bbox
		? flatBbox(feature.bbox)
		: positionsBbox(
				geometry.type === "Polygon"
					? geometry.coordinates.flat()
					: geometry.coordinates,
			)
	if (bbox === undefined)
		throw new ValidationError(`Feature ${String(feature.id)} has no coordinates`)

	const [minLon, minLat, maxLon, maxLat] = bbox
	return {
		name: featureTags(feature).name ?? "Unnamed",
		rect: { rtLat: maxLat, rtLon: maxLon, lbLat: minLat, lbLon: minLon },
		wkt: geometryToWkt(geometry),
	}
}

/**
 * Roll back a failed row. A rollback that fails too is logged and reported with the row, never thrown.
 * @returns The error to report for the row.
 */
async function rollBack(
	store: GeofenceStore,
	featureId: string | number | undefined,
	failure: string,
	log: Logger,
): Promise<string> {
	try {
		await store.rollback()
	} catch (error) {
		const message = `${failure} (rollback failed: ${errorMessage(error)})`
		log(`Geofence ${String(featureId)} failed: ${message}`, "error")
		return message
	}
	log(`Geofence ${String(featureId)} rolled back: ${failure}`, "error")
	return failure
}

/**
 * Write features to a geofence store, one transaction per feature.
 *
 * A feature that cannot be converted or written is reported in `failed` and its transaction rolled back; the
 * remaining features are still written, even when the rollback fails. Nothing is retried.
 */
export async function loadGeofences(
	features: Iterable<InterchangeFeature>,
	store: GeofenceStore,
	options: Partial<{ logger: Logger }> = {},
): Promise<GeofenceLoadResult> {
	const log = options.logger ?? consoleLogger
	const result: GeofenceLoadResult = { loaded: [], failed: [] }
	for (const feature of features) {
		const featureId = feature.id
		let row: GeofenceRow
		try {
			row = featureToGeofence(feature)
		} catch (error) {
			log(`Geofence ${String(featureId)} skipped: ${errorMessage(error)}`, "warn")
			result.failed.push({ featureId, error: errorMessage(error) })
			continue
		}

		try {
			await store.begin()
			const geofenceId = await store.insertGeofence({
				name: row.name,
				rect: row.rect,
			})
			await store.insertGeometry(geofenceId, row.wkt)
			await store.commit()
			result.loaded.push({ featureId, geofenceId })
			log(`Geofence ${String(featureId)} written as ${geofenceId}`, "debug")
		} catch (error) {
			result.failed.push({
				featureId,
				error: await rollBack(store, featureId, errorMessage(error), log),
			})
		}
	}
	log(
		`Loaded ${result.loaded.length} geofences, ${result.failed.length} failed`,
		"info",
	)
	return result
}
