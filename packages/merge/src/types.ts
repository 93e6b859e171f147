/**
 * Type definitions for the merge passes.
 * @module
 */

import type { GeometryEngine } from "@tidemark/shared/geometry"
import type { Logger } from "@tidemark/shared/log"
import type { GeoTags } from "@tidemark/shared/types"
import type { InterchangeCollection } from "@tidemark/geojson/types"

/**
 * What to do when two features share a merge key.
 * - `overwrite`: the later feature replaces the earlier one, in the earlier one's position.
 * - `skip`: the earlier feature is kept.
 * - `rekey`: both are kept, the later one under a fresh random key.
 */
export type CollisionPolicy = "overwrite" | "skip" | "rekey"

export interface MergeOptions {
	/** Tag holding the stable source id of a LineString feature. */
	lineKey: string
	/** Tag holding the stable source id of a Polygon feature. */
	polygonKey: string
	onCollision: CollisionPolicy
	/** Source of fresh keys for `rekey`, returning values in [0, 1). */
	random: () => number
	logger: Logger
}

export interface GeometryOptions {
	geometry: GeometryEngine
	logger: Logger
}

export interface ChainOptions {
	/** Ids of lines whose orientation is flipped before chaining. */
	reverse: Iterable<number>
	/** Tags merged onto the chained feature. */
	tags: GeoTags
	logger: Logger
}

/**
 * Options for `mergeExtracts`. Every stage is enabled by default.
 */
export interface MergePipelineOptions extends MergeOptions, GeometryOptions {
	deduplicateByTag: boolean
	deduplicateGeometries: boolean
	pruneCoveredLines: boolean
	pruneInnerRings: boolean
}

/**
 * Output of a pass that isolates failing features instead of aborting.
 */
export interface PassResult {
	kept: InterchangeCollection
	/** Features the pass could not process, with their original ids. */
	rejected: InterchangeCollection
}

export interface PruneResult extends PassResult {
	removed: InterchangeCollection
}

/**
 * Feature counts of a `mergeExtracts` run.
 */
export type MergeStats = {
	input: number
	deduplicatedByTag: number
	duplicateGeometries: number
	prunedLines: number
	prunedPolygons: number
	rejected: number
	output: number
}
