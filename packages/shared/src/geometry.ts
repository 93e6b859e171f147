/**
 * Geometry engine adapter.
 *
 * The merge passes and polygon containment queries only need a handful of predicates. They go through the
 * `GeometryEngine` interface so the computational-geometry library stays replaceable. `turfGeometry` is the default
 * implementation: point-in-polygon, segment intersection and polygon clipping come from Turf. `covers`/`contains`
 * cut each segment where Turf finds it meeting the polygon boundary and test a point of every piece.
 *
 * @module
 */

import { booleanPointInPolygon } from "@turf/boolean-point-in-polygon"
import {
	featureCollection,
	lineString,
	polygon as turfPolygon,
} from "@turf/helpers"
import { intersect as turfIntersect } from "@turf/intersect"
import { lineIntersect } from "@turf/line-intersect"
import type { LineString, Polygon, Position } from "geojson"
import { toLonLat } from "./coordinates"
import type { LonLat } from "./types"

export interface GeometryEngine {
	/** Whether a coordinate lies inside a polygon (holes excluded). Boundary points count unless `ignoreBoundary`. */
	pointInPolygon(
		lonLat: LonLat,
		polygon: Polygon,
		options?: { ignoreBoundary?: boolean },
	): boolean
	/** No point of `geometry` lies in the exterior of `container`. Boundary contact is allowed. */
	covers(container: Polygon, geometry: LineString | Polygon): boolean
	/**
	 * `container` covers `geometry` and some point of `geometry` lies in its interior. A line running only along the
	 * boundary is covered but not contained; a line inside that ends on the boundary is contained.
	 */
	contains(container: Polygon, geometry: LineString | Polygon): boolean
	/** Areal intersection of two polygons, one polygon per connected part. */
	intersect(a: Polygon, b: Polygon): Polygon[]
	/** Planar area in squared coordinate units, holes subtracted. */
	area(polygon: Polygon): number
}

// Pieces shorter than this (as a fraction of the segment) are not sampled.
const MIN_PIECE = 1e-12

function inside(lonLat: LonLat, polygon: Polygon, strict: boolean) {
	return booleanPointInPolygon(lonLat, polygon, { ignoreBoundary: strict })
}

/**
 * The vertices of a line and the midpoint of every piece its segments are cut into by the polygon boundary. Between
 * two cuts a piece lies wholly in the interior, in the exterior or along the boundary, so its midpoint stands for it.
 */
function samplePoints(positions: Position[], polygon: Polygon): LonLat[] {
	const points = positions.map(toLonLat)
	const samples = [...points]
	for (let i = 0; i < points.length - 1; i++) {
		const p = points[i]
		const q = points[i + 1]
		if (p === undefined || q === undefined) continue
		const dx = q[0] - p[0]
		const dy = q[1] - p[1]
		const len2 = dx * dx + dy * dy
		if (len2 === 0) continue
		const cuts = lineIntersect(lineString([p, q]), polygon, {
			ignoreSelfIntersections: true,
		})
			.features.map(({ geometry }) => {
				const [x, y] = toLonLat(geometry.coordinates)
				return ((x - p[0]) * dx + (y - p[1]) * dy) / len2
			})
			.filter((t) => t > 0 && t < 1)
		const ts = [0, ...cuts, 1].sort((a, b) => a - b)
		for (let j = 0; j < ts.length - 1; j++) {
			const t0 = ts[j] ?? 0
			const t1 = ts[j + 1] ?? 1
			if (t1 - t0 <= MIN_PIECE) continue
			const tm = (t0 + t1) / 2
			samples.push([p[0] + dx * tm, p[1] + dy * tm])
		}
	}
	return samples
}

interface Relation {
	/** No point lies in the exterior. */
	covered: boolean
	/** Some point lies in the interior. */
	interior: boolean
}

function lineRelation(positions: Position[], container: Polygon): Relation {
	const samples = samplePoints(positions, container)
	if (samples.length === 0) return { covered: false, interior: false }
	return {
		covered: samples.every((point) => inside(point, container, false)),
		interior: samples.some((point) => inside(point, container, true)),
	}
}

/**
 * A hole of the container that lies inside `geometry` leaves part of `geometry` uncovered even when its outer
 * boundary is covered.
 */
function holesOutside(container: Polygon, geometry: Polygon) {
	for (const hole of container.coordinates.slice(1)) {
		const first = hole[0]
		if (first === undefined) continue
		if (inside(toLonLat(first), geometry, true)) return false
	}
	return true
}

function relate(container: Polygon, geometry: LineString | Polygon): Relation {
	if (geometry.type === "LineString")
		return lineRelation(geometry.coordinates, container)
	const outer = geometry.coordinates[0]
	if (outer === undefined) return { covered: false, interior: false }
	// A covered polygon with any area reaches into the container's interior.
	return {
		covered:
			lineRelation(outer, container).covered &&
			holesOutside(container, geometry),
		interior: polygonArea(geometry) > 0,
	}
}

function ringArea(ring: Position[]) {
	const points = ring.map(toLonLat)
	let sum = 0
	for (let i = 0; i < points.length; i++) {
		const a = points[i]
		const b = points[(i + 1) % points.length]
		if (a === undefined || b === undefined) continue
		sum += a[0] * b[1] - b[0] * a[1]
	}
	return Math.abs(sum) / 2
}

function polygonArea(polygon: Polygon) {
	const [outer, ...holes] = polygon.coordinates
	if (outer === undefined) return 0
	const holesArea = holes.reduce((sum, hole) => sum + ringArea(hole), 0)
	return Math.max(0, ringArea(outer) - holesArea)
}

export const turfGeometry: GeometryEngine = {
	pointInPolygon(lonLat, polygon, options = {}) {
		return inside(lonLat, polygon, options.ignoreBoundary ?? false)
	},
	covers(container, geometry) {
		return relate(container, geometry).covered
	},
	contains(container, geometry) {
		const { covered, interior } = relate(container, geometry)
		return covered && interior
	},
	intersect(a, b) {
		const result = turfIntersect(
			featureCollection([turfPolygon(a.coordinates), turfPolygon(b.coordinates)]),
		)
		if (result === null) return []
		const { geometry } = result
		if (geometry.type === "Polygon") return [geometry]
		return geometry.coordinates.map(
			(coordinates): Polygon => ({ type: "Polygon", coordinates }),
		)
	},
	area: polygonArea,
}
