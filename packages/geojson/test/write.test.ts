import { readFile } from "node:fs/promises"
import { join } from "node:path"
import { Graph, Point } from "@tidemark/core"
import { IOError, ValidationError } from "@tidemark/shared/errors"
import { silentLogger } from "@tidemark/shared/log"
import { describe, expect, it, vi } from "vitest"
import { graphFromGeoJSON } from "../src/graph-from-geojson"
import { graphToGeoJSON, lineToFeature, polygonToFeature } from "../src/graph-to-geojson"
import {
	readGeoJSONFile,
	readGraphFile,
	writeGeoJSONFile,
	writeGraphFile,
} from "../src/io"
import { getFixturePath, withTempDir } from "../src/test/fixtures"

/**
 * One isolated point, one line of 2 points and one polygon of 3 points plus the closing point.
 */
function createRoundTripGraph() {
	const graph = new Graph({ logger: silentLogger })
	graph.points.addPoint({ id: 1, lat: 43.1, lon: 5.1 })
	graph.addLineRecord({
		id: 10,
		points: [
			{ id: 2, lat: 43.2, lon: 5.2 },
			{ id: 3, lat: 43.3, lon: 5.3 },
		],
		tags: { natural: "coastline" },
	})
	graph.addPolygonRecord({
		id: 20,
		outer: [
			{ id: 4, lat: 43, lon: 5 },
			{ id: 5, lat: 43, lon: 5.1 },
			{ id: 6, lat: 43.1, lon: 5.05 },
			{ id: 4, lat: 43, lon: 5 },
		],
		tags: { natural: "water" },
	})
	return graph
}

function squareGraph() {
	const graph = new Graph({ logger: silentLogger })
	for (const [id, lon, lat] of [
		[1, 0, 0],
		[2, 2, 0],
		[3, 2, 2],
		[4, 0, 2],
		[5, 1, 1],
	] as const)
		graph.points.addPoint({ id, lat, lon })
	return graph
}

describe("graphToGeoJSON", () => {
	it("round trips counts and coordinates", () => {
		const graph = createRoundTripGraph()
		const written = JSON.parse(JSON.stringify(graphToGeoJSON(graph)))
		const read = graphFromGeoJSON(written, { logger: silentLogger })

		expect(read.info().stats).toEqual(graph.info().stats)
		expect(read.info().stats).toEqual({ points: 6, lines: 1, polygons: 1 })
		for (const point of graph.points) {
			const copy = read.points.get(point.id)
			expect(copy?.lat).toBeCloseTo(point.lat, 9)
			expect(copy?.lon).toBeCloseTo(point.lon, 9)
		}
		expect(read.lines.get(10)?.refs).toEqual([2, 3])
		expect(read.polygons.get(20)?.outer).toEqual([4, 5, 6, 4])
	})

	it("writes lines, then polygons, then isolated points", () => {
		const features = graphToGeoJSON(createRoundTripGraph()).features
		expect(features.map((feature) => [feature.geometry.type, feature.id])).toEqual([
			["LineString", 10],
			["Polygon", 20],
			["Point", 1],
		])
		expect(features[0]).toEqual({
			type: "Feature",
			id: 10,
			bbox: [5.2, 43.2, 5.3, 43.3],
			geometry: {
				type: "LineString",
				coordinates: [
					[5.2, 43.2],
					[5.3, 43.3],
				],
			},
			properties: { tags: { natural: "coastline" }, id_nodes: [2, 3] },
		})
		expect(features[2]).toEqual({
			type: "Feature",
			id: 1,
			bbox: [5.1, 43.1, 5.1, 43.1],
			geometry: { type: "Point", coordinates: [5.1, 43.1] },
			properties: { tags: {}, id_nodes: [1] },
		})
	})

	it("refuses to write nothing", () => {
		expect(() => graphToGeoJSON(new Graph({ logger: silentLogger }))).toThrow(
			new ValidationError("Nothing to write: graph unknown is empty"),
		)
	})

	it("writes extra points once", () => {
		const graph = squareGraph()
		const extra = new Point({ id: 9, lat: 5, lon: 5 })
		const isolated = graph.points.get(5)
		if (isolated === null) throw Error("missing point 5")
		const { features } = graphToGeoJSON(graph, {
			extraPoints: [extra, isolated],
			logger: silentLogger,
		})
		expect(features.map((feature) => feature.id)).toEqual([1, 2, 3, 4, 5, 9])

		const onlyExtra = graphToGeoJSON(new Graph({ logger: silentLogger }), {
			extraPoints: [extra],
		})
		expect(onlyExtra.features.map((feature) => feature.id)).toEqual([9])
	})

	it("skips lines with fewer than 2 points", () => {
		const graph = squareGraph()
		const line = graph.lines.addLine({ id: 10, refs: [1] })
		const logger = vi.fn()
		expect(lineToFeature(line, logger)).toBeNull()
		expect(logger).toHaveBeenCalledWith("Skipping line 10: 1 points", "warn")
	})

	it("closes open rings in the output only", () => {
		const graph = squareGraph()
		const polygon = graph.polygons.addPolygon({ id: 20, outer: [1, 2, 3] })
		const logger = vi.fn()
		const feature = polygonToFeature(polygon, logger)

		expect(feature?.properties.id_nodes).toEqual([[1, 2, 3, 1]])
		expect(feature?.geometry.coordinates).toEqual([
			[
				[0, 0],
				[2, 0],
				[2, 2],
				[0, 0],
			],
		])
		expect(logger).toHaveBeenCalledWith("Closing outer ring of polygon 20", "warn")
		expect(polygon.outer).toEqual([1, 2, 3])
	})

	it("skips short rings", () => {
		const graph = squareGraph()
		const withShortHole = graph.polygons.addPolygon({
			id: 20,
			outer: [1, 2, 3, 4, 1],
			inner: [[5, 3]],
		})
		const short = graph.polygons.addPolygon({ id: 21, outer: [1, 2] })
		const logger = vi.fn()

		expect(polygonToFeature(withShortHole, logger)?.properties.id_nodes).toEqual([
			[1, 2, 3, 4, 1],
		])
		expect(logger).toHaveBeenCalledWith(
			"Skipping inner ring 0 of polygon 20: 2 points",
			"warn",
		)
		expect(polygonToFeature(short, logger)).toBeNull()
		expect(logger).toHaveBeenCalledWith(
			"Skipping polygon 21: outer ring has 2 points",
			"warn",
		)
	})
})

describe("interchange files", () => {
	it("writes indented JSON into new directories and reads it back", async () => {
		await withTempDir(async (dir) => {
			const path = join(dir, "nested", "out", "harbor.geojson")
			await writeGraphFile(path, createRoundTripGraph(), { logger: silentLogger })

			const text = await readFile(path, "utf-8")
			expect(text.startsWith('{\n  "type": "FeatureCollection",\n  "features": [\n')).toBe(true)

			const graph = await readGraphFile(path, { logger: silentLogger })
			expect(graph.id).toBe("harbor.geojson")
			expect(graph.info().stats).toEqual({ points: 6, lines: 1, polygons: 1 })

			const fast = await readGraphFile(path, { fast: true, logger: silentLogger })
			expect(fast.info().stats).toEqual({ points: 0, lines: 1, polygons: 1 })
		})
	})

	it("reads the harbor fixture", async () => {
		const harbor = await readGeoJSONFile(getFixturePath("harbor.geojson"))
		expect(harbor.features).toHaveLength(6)
		expect(harbor.features[4]?.bbox).toEqual([5.36, 43.29, 5.3723, 43.299])
	})

	it("reports a missing file as an IOError", async () => {
		await withTempDir(async (dir) => {
			const path = join(dir, "missing.geojson")
			const error = await readGeoJSONFile(path).catch((e: unknown) => e)
			expect(error).toBeInstanceOf(IOError)
			expect(error).toMatchObject({ path, message: `Cannot read ${path}` })
		})
	})

	it("reports an unwritable path as an IOError", async () => {
		await withTempDir(async (dir) => {
			const blocker = join(dir, "blocker")
			await writeGeoJSONFile(blocker, { type: "FeatureCollection", features: [] }, {
				logger: silentLogger,
			})
			const path = join(blocker, "out.geojson")
			await expect(
				writeGeoJSONFile(path, { type: "FeatureCollection", features: [] }),
			).rejects.toThrow(IOError)
		})
	})
})
