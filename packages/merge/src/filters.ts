import { consoleLogger, type Logger } from "@tidemark/shared/log"
import type {
	InterchangeCollection,
	InterchangeFeature,
} from "@tidemark/geojson/types"
import type { LineString } from "geojson"
import { featureCollection, featureHasTagValue, isLineFeature } from "./utils"

/**
 * The LineString features tagged `natural=coastline`.
 */
export function extractCoastline(
	collection: InterchangeCollection,
	options: Partial<{ logger: Logger }> = {},
): InterchangeCollection<LineString> {
	const log = options.logger ?? consoleLogger
	const coastline = collection.features
		.filter(isLineFeature)
		.filter((feature) => featureHasTagValue(feature, "natural", "coastline"))
	log(`Extracted ${coastline.length} coastline lines`, "info")
	return featureCollection(coastline)
}

/**
 * Split off the features tagged `key=value`.
 */
export function removeFeaturesByTag(
	collection: InterchangeCollection,
	key: string,
	value: string,
	options: Partial<{ logger: Logger }> = {},
): { kept: InterchangeCollection; removed: InterchangeCollection } {
	const log = options.logger ?? consoleLogger
	const kept: InterchangeFeature[] = []
	const removed: InterchangeFeature[] = []
	for (const feature of collection.features) {
		if (featureHasTagValue(feature, key, value)) {
			log(`Removing feature ${String(feature.id)} tagged ${key}=${value}`, "debug")
			removed.push(feature)
		} else {
			kept.push(feature)
		}
	}
	return { kept: featureCollection(kept), removed: featureCollection(removed) }
}

/**
 * Keep only the id, bbox and geometry of every feature.
 */
export function stripProperties(
	collection: InterchangeCollection,
): InterchangeCollection {
	return featureCollection(
		collection.features.map(({ id, bbox, geometry }) => {
			const feature: InterchangeFeature = {
				type: "Feature",
				geometry,
				properties: {},
			}
			if (id !== undefined) feature.id = id
			if (bbox !== undefined) feature.bbox = bbox
			return feature
		}),
	)
}
