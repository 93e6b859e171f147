import type {
	InterchangeCollection,
	InterchangeFeature,
} from "@tidemark/geojson/types"
import { turfGeometry } from "@tidemark/shared/geometry"
import { chainLines } from "./chain"
import {
	DEFAULT_MERGE_OPTIONS,
	deduplicateByTag,
	deduplicateGeometries,
} from "./dedupe"
import { extractCoastline } from "./filters"
import { pruneCoveredLines, pruneInnerRings } from "./prune"
import type {
	ChainOptions,
	MergeOptions,
	MergePipelineOptions,
	MergeStats,
} from "./types"
import { featureCollection, statsSummary } from "./utils"

export const DEFAULT_PIPELINE_OPTIONS: Readonly<MergePipelineOptions> =
	Object.freeze({
		...DEFAULT_MERGE_OPTIONS,
		geometry: turfGeometry,
		deduplicateByTag: true,
		deduplicateGeometries: true,
		pruneCoveredLines: true,
		pruneInnerRings: true,
	})

export interface MergeResult {
	collection: InterchangeCollection
	/** Features rejected by any stage, with the ids they had at that stage. */
	rejected: InterchangeCollection
	stats: MergeStats
}

/**
 * Run the merge pipeline over overlapping extracts:
 * 1. Deduplicate by source id tag
 * 2. Deduplicate exact geometries
 * 3. Prune lines running along polygon boundaries
 * 4. Prune polygons duplicating inner rings
 *
 * A missing source id tag fails the whole run. Features a later stage cannot process are collected in `rejected`.
 */
export function mergeExtracts(
	collections: InterchangeCollection[],
	options: Partial<MergePipelineOptions> = {},
): MergeResult {
	const opts = { ...DEFAULT_PIPELINE_OPTIONS, ...options }
	const log = (message: string) => opts.logger(message, "info")
	const rejected: InterchangeFeature[] = []
	const stats: MergeStats = {
		input: collections.reduce((sum, c) => sum + c.features.length, 0),
		deduplicatedByTag: 0,
		duplicateGeometries: 0,
		prunedLines: 0,
		prunedPolygons: 0,
		rejected: 0,
		output: 0,
	}

	let collection: InterchangeCollection
	if (opts.deduplicateByTag) {
		log("Deduplicating features by tag...")
		collection = deduplicateByTag(collections, opts)
		stats.deduplicatedByTag = stats.input - collection.features.length
	} else {
		collection = featureCollection(collections.flatMap((c) => c.features))
	}

	if (opts.deduplicateGeometries) {
		log("Deduplicating geometries...")
		const before = collection.features.length
		const result = deduplicateGeometries(collection, opts)
		collection = result.kept
		rejected.push(...result.rejected.features)
		stats.duplicateGeometries =
			before - collection.features.length - result.rejected.features.length
	}

	if (opts.pruneCoveredLines) {
		log("Pruning lines along polygon boundaries...")
		const result = pruneCoveredLines(collection, opts)
		collection = result.kept
		rejected.push(...result.rejected.features)
		stats.prunedLines = result.removed.features.length
	}

	if (opts.pruneInnerRings) {
		log("Pruning polygons duplicating inner rings...")
		const result = pruneInnerRings(collection, opts)
		collection = result.kept
		rejected.push(...result.rejected.features)
		stats.prunedPolygons = result.removed.features.length
	}

	stats.rejected = rejected.length
	stats.output = collection.features.length
	log(statsSummary("Merge summary", stats))
	return {
		collection,
		rejected: featureCollection(rejected),
		stats,
	}
}

/**
 * Deduplicate extracts by source id tag, keep their coastline, and chain it from line `startId`.
 *
 * `startId` is a feature id of the deduplicated collection, where features are numbered lines first.
 */
export function chainCoastline(
	collections: InterchangeCollection[],
	startId: number,
	options: Partial<MergeOptions & ChainOptions> = {},
): InterchangeCollection {
	const merged = deduplicateByTag(collections, options)
	const coastline = extractCoastline(merged, options)
	return chainLines(coastline, startId, options)
}
