/**
 * Helpers shared by the merge passes:
 * - Feature narrowing and tag access
 * - Rejected feature bookkeeping
 * - Stage summaries
 *
 * @module
 */

import { bboxFromLonLats } from "@tidemark/shared/bbox"
import { toLonLat } from "@tidemark/shared/coordinates"
import { errorMessage } from "@tidemark/shared/errors"
import type { Logger } from "@tidemark/shared/log"
import type { GeoBbox2D, GeoTags } from "@tidemark/shared/types"
import type {
	InterchangeCollection,
	InterchangeFeature,
	InterchangeGeometry,
} from "@tidemark/geojson/types"
import type { LineString, Polygon, Position } from "geojson"

export function featureCollection<G extends InterchangeGeometry>(
	features: InterchangeFeature<G>[],
): InterchangeCollection<G> {
	return { type: "FeatureCollection", features }
}

export function isLineFeature(
	feature: InterchangeFeature,
): feature is InterchangeFeature<LineString> {
	return feature.geometry.type === "LineString"
}

export function isPolygonFeature(
	feature: InterchangeFeature,
): feature is InterchangeFeature<Polygon> {
	return feature.geometry.type === "Polygon"
}

export function featureTags(feature: InterchangeFeature): GeoTags {
	return feature.properties.tags ?? {}
}

/**
 * Check if a feature has a specific tag with a specific value.
 */
export function featureHasTagValue(
	feature: InterchangeFeature,
	key: string,
	value: string,
) {
	return featureTags(feature)[key] === value
}

/**
 * Copy of the features with ids `0..n-1` in order.
 */
export function renumber<G extends InterchangeGeometry>(
	features: InterchangeFeature<G>[],
	start = 0,
): InterchangeFeature<G>[] {
	return features.map((feature, index) => ({ ...feature, id: start + index }))
}

export function positionsBbox(positions: Position[]): GeoBbox2D | undefined {
	return bboxFromLonLats(positions.map(toLonLat)) ?? undefined
}

type Attempt<T> = { ok: true; value: T } | { ok: false }

/**
 * Collects the features a pass could not process. Each one is logged with the pass name and the error message.
 */
export class Rejections {
	readonly features: InterchangeFeature[] = []
	private readonly members = new Set<InterchangeFeature>()

	constructor(
		private readonly pass: string,
		private readonly log: Logger,
	) {}

	/**
	 * Run `fn` for `feature`. An `Error` thrown by it rejects the feature; anything else is rethrown.
	 */
	run<T>(feature: InterchangeFeature, fn: () => T): Attempt<T> {
		try {
			return { ok: true, value: fn() }
		} catch (error) {
			if (!(error instanceof Error)) throw error
			this.add(feature, error)
			return { ok: false }
		}
	}

	add(feature: InterchangeFeature, error: unknown) {
		this.log(
			`${this.pass}: rejected feature ${String(feature.id)}: ${errorMessage(error)}`,
			"warn",
		)
		this.members.add(feature)
		this.features.push(feature)
	}

	has(feature: InterchangeFeature) {
		return this.members.has(feature)
	}

	get size() {
		return this.features.length
	}

	toCollection(): InterchangeCollection {
		return featureCollection(this.features)
	}
}

/**
 * Convert camelCase string to sentence case.
 * @returns The string in sentence case (e.g., "prunedLines" -> "pruned lines").
 */
export function camelCaseToSentenceCase(str: string) {
	return str
		.replace(/([A-Z])/g, " $1")
		.trim()
		.toLowerCase()
}

/**
 * Summarize non-zero counts, largest first.
 */
export function statsSummary(title: string, stats: Record<string, number>) {
	const counts = Object.entries(stats).filter(([, value]) => value > 0)
	if (counts.length === 0) return `${title}: nothing to report.`
	const sorted = [...counts]
		.sort((a, b) => b[1] - a[1])
		.map(
			([key, value]) =>
				`${camelCaseToSentenceCase(key)}: ${value.toLocaleString("en-US")}`,
		)
	return `${title}: ${sorted.join(", ")}`
}
