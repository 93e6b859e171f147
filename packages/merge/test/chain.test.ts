import {
	collection,
	lineFeature,
	pointFeature,
	polygonFeature,
	rectangle,
} from "@tidemark/geojson/test/fixtures"
import { StructuralError } from "@tidemark/shared/errors"
import { silentLogger } from "@tidemark/shared/log"
import { describe, expect, it, vi } from "vitest"
import { chainLines } from "../src/chain"

const coastA = lineFeature(
	1,
	[
		[0, 0],
		[1, 0],
		[2, 0],
	],
	[1, 2, 3],
	{ natural: "coastline", OSM_way_id: "a" },
)
const coastB = lineFeature(
	2,
	[
		[2, 0],
		[3, 0],
	],
	[3, 4],
)
const coastC = lineFeature(
	3,
	[
		[4, 0],
		[3, 0],
	],
	[5, 4],
)

describe("chainLines", () => {
	it("appends head matches and reverses tail matches", () => {
		const logger = vi.fn()
		const chained = chainLines(collection(coastA, coastB, coastC), 1, { logger })

		expect(chained.features).toEqual([
			{
				type: "Feature",
				id: 1,
				bbox: [0, 0, 4, 0],
				geometry: {
					type: "LineString",
					coordinates: [
						[0, 0],
						[1, 0],
						[2, 0],
						[3, 0],
						[4, 0],
					],
				},
				properties: {
					tags: { natural: "coastline", OSM_way_id: "a" },
					id_nodes: [1, 2, 3, 4, 5],
				},
			},
		])
		expect(logger.mock.calls).toEqual([
			["Chained line 2: 4 points", "debug"],
			["Chained line 3 (reversed): 5 points", "debug"],
			["Chained 2 lines onto line 1: 5 points, 0 features left", "info"],
		])
	})

	it("restarts the search after every match", () => {
		const chained = chainLines(collection(coastC, coastB, coastA), 1, {
			logger: silentLogger,
		})
		expect(chained.features).toHaveLength(1)
		expect(chained.features[0]?.properties.id_nodes).toEqual([1, 2, 3, 4, 5])
	})

	it("returns unmatched features as they are, before the chained line", () => {
		const island = lineFeature(
			4,
			[
				[9, 9],
				[10, 10],
			],
			[8, 9],
		)
		const noIds = lineFeature(6, [
			[2, 0],
			[5, 5],
		])
		const buoy = pointFeature(7, [2, 0])
		const chained = chainLines(
			collection(coastA, island, coastB, noIds, buoy, coastC),
			1,
			{ logger: silentLogger },
		)

		expect(chained.features).toHaveLength(4)
		expect(chained.features[0]).toBe(island)
		expect(chained.features[1]).toBe(noIds)
		expect(chained.features[2]).toBe(buoy)
		expect(chained.features[3]?.properties.id_nodes).toEqual([1, 2, 3, 4, 5])
	})

	it("flips the lines it is told to reverse", () => {
		const spur = lineFeature(
			7,
			[
				[-1, 0],
				[0, 0],
			],
			[0, 1],
		)
		const asIs = chainLines(collection(coastA, spur), 1, { logger: silentLogger })
		expect(asIs.features.map((feature) => feature.properties.id_nodes)).toEqual([
			[0, 1],
			[1, 2, 3],
		])

		const flipped = chainLines(collection(coastA, spur), 1, {
			reverse: [1],
			logger: silentLogger,
		})
		expect(flipped.features).toHaveLength(1)
		expect(flipped.features[0]?.properties.id_nodes).toEqual([3, 2, 1, 0])
		expect(flipped.features[0]?.geometry).toEqual({
			type: "LineString",
			coordinates: [
				[2, 0],
				[1, 0],
				[0, 0],
				[-1, 0],
			],
		})
		// the input keeps its orientation
		expect(coastA.properties.id_nodes).toEqual([1, 2, 3])
	})

	it("merges extra tags onto the chained line", () => {
		const chained = chainLines(collection(coastA, coastB), 1, {
			tags: { origin: "chained" },
			logger: silentLogger,
		})
		expect(chained.features[0]?.properties.tags).toEqual({
			natural: "coastline",
			OSM_way_id: "a",
			origin: "chained",
		})
	})

	it("fails without a usable start line", () => {
		const basin = polygonFeature(5, [rectangle(0, 0, 1, 1)])
		const lines = collection(coastA, basin)
		expect(() => chainLines(lines, 42, { logger: silentLogger })).toThrow(
			new StructuralError("Cannot chain from line 42: not found"),
		)
		expect(() => chainLines(lines, 5, { logger: silentLogger })).toThrow(
			new StructuralError(
				"Cannot chain from feature 5: not a line with matching id_nodes",
			),
		)
	})
})
