import { silentLogger } from "@tidemark/shared/log"
import { describe, expect, it } from "vitest"
import { Graph } from "../src/graph"
import { createMockGraph, MOCK_HARBOR } from "../src/mocks"

describe("Graph", () => {
	it("has no bbox while empty", () => {
		const graph = new Graph({ logger: silentLogger })
		expect(graph.isEmpty()).toBe(true)
		expect(graph.bbox()).toBeNull()
		expect(graph.info()).toEqual({
			id: "unknown",
			bbox: null,
			stats: { points: 0, lines: 0, polygons: 0 },
		})
	})

	it("aggregates the bbox over every registry", () => {
		const graph = new Graph({ logger: silentLogger })
		graph.addLineRecord({
			id: 1,
			points: [
				{ id: 1, lon: -3, lat: 1 },
				{ id: 2, lon: 0, lat: 2 },
			],
		})
		graph.addPolygonRecord({
			id: 2,
			outer: [
				{ id: 3, lon: 5, lat: -4 },
				{ id: 4, lon: 6, lat: -4 },
				{ id: 5, lon: 6, lat: -3 },
				{ id: 3, lon: 5, lat: -4 },
			],
		})
		graph.points.addPoint({ id: 6, lat: 7, lon: 1 })
		expect(graph.bbox()).toEqual([-3, -4, 6, 7])
	})

	it("reuses registered points when adding decoder records", () => {
		const graph = new Graph({ id: "records", logger: silentLogger })
		graph.addLineRecord({
			id: 1,
			points: [
				{ id: 1, lon: 0, lat: 0 },
				{ id: 2, lon: 1, lat: 0 },
			],
			tags: { natural: "coastline" },
		})
		const polygon = graph.addPolygonRecord({
			id: 2,
			outer: [
				{ id: 2, lon: 1, lat: 0 },
				{ id: 3, lon: 1, lat: 1 },
				{ id: 4, lon: 0, lat: 1 },
				{ id: 2, lon: 1, lat: 0 },
			],
			inner: [],
			tags: { natural: "water" },
		})

		expect(graph.points.size).toBe(4)
		expect(polygon.outer).toEqual([2, 3, 4, 2])
		const shared = graph.points.get(2)
		expect(shared?.lineIds.has(1)).toBe(true)
		expect(shared?.polygonIds.has(2)).toBe(true)
		expect(graph.info()).toEqual({
			id: "records",
			bbox: [0, 0, 1, 1],
			stats: { points: 4, lines: 1, polygons: 1 },
		})
	})

	it("queries every registry with an inclusive bbox", () => {
		const graph = createMockGraph(silentLogger)
		const { lat, lon, oneKmLat, oneKmLon } = MOCK_HARBOR
		// The north-east corner of the basin, where both coastline lines meet
		const corner = graph.queryBbox([
			lon + oneKmLon,
			lat + oneKmLat,
			lon + oneKmLon,
			lat + oneKmLat,
		])
		expect(corner.points.map((point) => point.id)).toEqual([3])
		expect(corner.lines.map((line) => line.id)).toEqual([10, 11])
		expect(corner.polygons.map((polygon) => polygon.id)).toEqual([20])
	})

	it("recomputes neighbors across the graph", () => {
		const graph = createMockGraph(silentLogger)
		graph.recomputeNeighbors()
		expect(graph.lines.get(10)?.neighborLines).toEqual(new Map([[11, [3]]]))
		expect(graph.lines.get(11)?.neighborLines).toEqual(new Map([[10, [3]]]))
	})

	it("cascades a cleared line registry into the points", () => {
		const graph = createMockGraph(silentLogger)
		graph.lines.clear()
		expect(graph.lines.size).toBe(0)
		expect(graph.points.get(3)?.lineIds.size).toBe(0)
		expect(graph.points.get(3)?.polygonIds.has(20)).toBe(true)
		expect(graph.points.removeIsolated().map((point) => point.id)).toEqual([5, 6])
	})
})
