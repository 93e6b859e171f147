/**
 * Line chaining: stitch line features that share endpoint ids into one continuous line.
 * @module
 */

import { StructuralError } from "@tidemark/shared/errors"
import { consoleLogger } from "@tidemark/shared/log"
import type {
	InterchangeCollection,
	InterchangeFeature,
} from "@tidemark/geojson/types"
import { extractFeatureId, flatIdNodes } from "@tidemark/geojson/utils"
import type { LineString, Position } from "geojson"
import type { ChainOptions } from "./types"
import {
	featureCollection,
	featureTags,
	isLineFeature,
	positionsBbox,
} from "./utils"

interface ChainLink {
	id: number
	coordinates: Position[]
	ids: number[]
}

/**
 * The coordinates and point ids of a line feature, reversed when asked to.
 * @returns `null` when the feature is not a line or its `id_nodes` do not match its coordinates.
 */
function toLink(
	feature: InterchangeFeature,
	reverse: Set<number>,
): ChainLink | null {
	const id = extractFeatureId(feature.id)
	if (id === undefined || !isLineFeature(feature)) return null
	const ids = flatIdNodes(feature.properties.id_nodes)
	const coordinates = feature.geometry.coordinates
	if (ids === undefined || ids.length === 0 || ids.length !== coordinates.length)
		return null
	if (!reverse.has(id)) return { id, coordinates, ids }
	return {
		id,
		coordinates: [...coordinates].reverse(),
		ids: [...ids].reverse(),
	}
}

/**
 * Chain lines onto the line `startId`.
 *
 * Repeatedly looks through the remaining lines, in collection order, for one whose first or last point id equals the
 * chain's last point id. A line that starts there is appended as it is; a line that ends there is reversed first.
 * The shared point is not repeated. Each match restarts the search from the first remaining line, until a full pass
 * finds none. Worst case is quadratic in the number of lines.
 *
 * Lines listed in `options.reverse` are flipped before chaining. Features that are not lines, or whose `id_nodes` do
 * not match their coordinates, never match.
 *
 * @returns The unmatched features as they were, followed by the chained line with id `startId`.
 * @throws StructuralError when no usable line has id `startId`.
 */
export function chainLines(
	collection: InterchangeCollection,
	startId: number,
	options: Partial<ChainOptions> = {},
): InterchangeCollection {
	const log = options.logger ?? consoleLogger
	const reverse = new Set(options.reverse ?? [])

	const start = collection.features.find(
		(feature) => extractFeatureId(feature.id) === startId,
	)
	if (start === undefined)
		throw new StructuralError(`Cannot chain from line ${startId}: not found`)
	const first = toLink(start, reverse)
	if (first === null)
		throw new StructuralError(
			`Cannot chain from feature ${startId}: not a line with matching id_nodes`,
		)

	const coordinates = [...first.coordinates]
	const ids = [...first.ids]
	const pool = collection.features
		.filter((feature) => feature !== start)
		.map((feature) => ({ feature, link: toLink(feature, reverse) }))

	let chained = 0
	let found = true
	while (found) {
		found = false
		const tail = ids.at(-1)
		for (const [index, { link }] of pool.entries()) {
			if (link === null) continue
			let next: ChainLink
			if (link.ids[0] === tail) next = link
			else if (link.ids.at(-1) === tail)
				next = {
					id: link.id,
					coordinates: [...link.coordinates].reverse(),
					ids: [...link.ids].reverse(),
				}
			else continue

			coordinates.push(...next.coordinates.slice(1))
			ids.push(...next.ids.slice(1))
			pool.splice(index, 1)
			chained++
			found = true
			log(
				`Chained line ${link.id}${next === link ? "" : " (reversed)"}: ${ids.length} points`,
				"debug",
			)
			break
		}
	}

	const geometry: LineString = { type: "LineString", coordinates }
	const line: InterchangeFeature<LineString> = {
		type: "Feature",
		id: startId,
		bbox: positionsBbox(coordinates),
		geometry,
		properties: {
			...start.properties,
			tags: { ...featureTags(start), ...options.tags },
			id_nodes: ids,
		},
	}
	log(
		`Chained ${chained} lines onto line ${startId}: ${ids.length} points, ${pool.length} features left`,
		"info",
	)
	return featureCollection([...pool.map(({ feature }) => feature), line])
}
