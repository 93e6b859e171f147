import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { dirname, join, resolve } from "node:path"
import { fileURLToPath } from "node:url"
import type { GeoTags } from "@tidemark/shared/types"
import type { LineString, Point, Polygon, Position } from "geojson"
import type { InterchangeCollection, InterchangeFeature } from "../types"

const __dirname = dirname(fileURLToPath(import.meta.url))
const ROOT_DIR = resolve(__dirname, "../../../../")
const FIXTURES_DIR = resolve(ROOT_DIR, "fixtures")

/**
 * Interchange files checked into the top level fixtures directory.
 *
 * `harbor.geojson` holds two coastline lines meeting at point 3, a line whose `id_nodes` do not match its
 * coordinates, a line with a string id, a water polygon sharing points 1-3 with the first line, and a buoy point.
 */
export function getFixturePath(fileName: string) {
	return join(FIXTURES_DIR, fileName)
}

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards.
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
	const dir = await mkdtemp(join(tmpdir(), "tidemark-"))
	try {
		return await fn(dir)
	} finally {
		await rm(dir, { recursive: true, force: true })
	}
}

export function pointFeature(
	id: number,
	coordinates: Position,
	tags: GeoTags = {},
): InterchangeFeature<Point> {
	return {
		type: "Feature",
		id,
		geometry: { type: "Point", coordinates },
		properties: { tags, id_nodes: [id] },
	}
}

export function lineFeature(
	id: number,
	coordinates: Position[],
	idNodes?: number[],
	tags: GeoTags = {},
): InterchangeFeature<LineString> {
	return {
		type: "Feature",
		id,
		geometry: { type: "LineString", coordinates },
		properties: idNodes ? { tags, id_nodes: idNodes } : { tags },
	}
}

export function polygonFeature(
	id: number,
	rings: Position[][],
	tags: GeoTags = {},
	idNodes?: number[][],
): InterchangeFeature<Polygon> {
	return {
		type: "Feature",
		id,
		geometry: { type: "Polygon", coordinates: rings },
		properties: idNodes ? { tags, id_nodes: idNodes } : { tags },
	}
}

/**
 * Closed axis-aligned rectangle ring.
 */
export function rectangle(
	minLon: number,
	minLat: number,
	maxLon: number,
	maxLat: number,
): Position[] {
	return [
		[minLon, minLat],
		[maxLon, minLat],
		[maxLon, maxLat],
		[minLon, maxLat],
		[minLon, minLat],
	]
}

export function collection(
	...features: InterchangeFeature[]
): InterchangeCollection {
	return { type: "FeatureCollection", features }
}
