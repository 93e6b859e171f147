/**
 * Deduplication across overlapping extracts.
 *
 * Extracts cut from neighbouring regions repeat the features along their shared border. `deduplicateByTag` matches
 * them by their stable source id, `deduplicateGeometries` by their exact coordinates.
 *
 * @module
 */

import { StructuralError } from "@tidemark/shared/errors"
import { consoleLogger, type Logger } from "@tidemark/shared/log"
import { geometryToWkt } from "@tidemark/shared/wkt"
import type {
	InterchangeCollection,
	InterchangeFeature,
} from "@tidemark/geojson/types"
import type { MergeOptions, PassResult } from "./types"
import {
	featureCollection,
	featureTags,
	isLineFeature,
	isPolygonFeature,
	Rejections,
	renumber,
} from "./utils"

export const DEFAULT_MERGE_OPTIONS: Readonly<MergeOptions> = Object.freeze({
	lineKey: "OSM_way_id",
	polygonKey: "OSM_area_id",
	onCollision: "overwrite",
	random: Math.random,
	logger: consoleLogger,
})

// Fresh keys for `rekey` are `rekey:<n>`, n drawn from [1, REKEY_RANGE]. Tag values never take the prefixed
// form, so a fresh key cannot collide with a later source id.
const REKEY_PREFIX = "rekey:"
const REKEY_RANGE = 1_000_000_000_000

class KeyedFeatures {
	readonly features = new Map<string, InterchangeFeature>()

	constructor(
		private readonly key: string,
		private readonly options: Pick<
			MergeOptions,
			"onCollision" | "random" | "logger"
		>,
	) {}

	add(feature: InterchangeFeature) {
		const value = featureTags(feature)[this.key]
		if (value === undefined)
			throw new StructuralError(
				`${feature.geometry.type} feature ${String(feature.id)} has no "${this.key}" tag`,
			)
		const log = this.options.logger
		const existing = this.features.get(value)
		if (existing === undefined) {
			this.features.set(value, feature)
			return
		}
		switch (this.options.onCollision) {
			case "overwrite":
				this.features.set(value, feature)
				log(`Duplicate ${this.key} ${value} overwritten`, "debug")
				break
			case "skip":
				log(`Duplicate ${this.key} ${value} skipped`, "debug")
				break
			case "rekey": {
				const fresh = this.freshKey()
				this.features.set(fresh, feature)
				log(`Duplicate ${this.key} ${value} kept under key ${fresh}`, "debug")
				break
			}
		}
	}

	private freshKey() {
		let key: string
		do {
			key = `${REKEY_PREFIX}${1 + Math.floor(this.options.random() * REKEY_RANGE)}`
		} while (this.features.has(key))
		return key
	}
}

/**
 * Combine several collections, keeping one feature per source id.
 *
 * LineString features are keyed by `tags[lineKey]`, Polygon features by `tags[polygonKey]`; other features are kept
 * as they are. The output holds the lines, then the polygons, then the other features, renumbered `0..n-1`.
 *
 * @throws StructuralError when a LineString or Polygon feature lacks its key. Nothing is returned in that case.
 */
export function deduplicateByTag(
	collections: InterchangeCollection[],
	options: Partial<MergeOptions> = {},
): InterchangeCollection {
	const opts = { ...DEFAULT_MERGE_OPTIONS, ...options }
	const lines = new KeyedFeatures(opts.lineKey, opts)
	const polygons = new KeyedFeatures(opts.polygonKey, opts)
	const others: InterchangeFeature[] = []

	let input = 0
	for (const collection of collections) {
		for (const feature of collection.features) {
			input++
			if (isLineFeature(feature)) lines.add(feature)
			else if (isPolygonFeature(feature)) polygons.add(feature)
			else others.push(feature)
		}
	}

	const features = renumber([
		...lines.features.values(),
		...polygons.features.values(),
		...others,
	])
	opts.logger(
		`Deduplicated ${input} features by tag: ${features.length} remain`,
		"info",
	)
	return featureCollection(features)
}

/**
 * Drop features whose geometry repeats an earlier one exactly. Geometries are compared by their canonical WKT.
 *
 * The first occurrence is kept. Kept features are renumbered `0..n-1`. A feature whose geometry cannot be written as
 * WKT goes to `rejected` with its original id.
 */
export function deduplicateGeometries(
	collection: InterchangeCollection,
	options: Partial<{ logger: Logger }> = {},
): PassResult {
	const log = options.logger ?? consoleLogger
	const rejections = new Rejections("Geometry deduplication", log)
	const unique = new Map<string, InterchangeFeature>()
	for (const feature of collection.features) {
		const wkt = rejections.run(feature, () => geometryToWkt(feature.geometry))
		if (!wkt.ok) continue
		const first = unique.get(wkt.value)
		if (first !== undefined) {
			log(
				`Dropping feature ${String(feature.id)}: same geometry as feature ${String(first.id)}`,
				"debug",
			)
			continue
		}
		unique.set(wkt.value, feature)
	}

	const kept = renumber([...unique.values()])
	log(
		`Deduplicated ${collection.features.length} geometries: ${kept.length} kept, ${rejections.size} rejected`,
		"info",
	)
	return {
		kept: featureCollection(kept),
		rejected: rejections.toCollection(),
	}
}
