import { bboxFromLonLats, extendBbox } from "@tidemark/shared/bbox"
import { toLonLat } from "@tidemark/shared/coordinates"
import { StructuralError, ValidationError } from "@tidemark/shared/errors"
import type { GeoBbox2D, GeoTags, LatLon, LonLat } from "@tidemark/shared/types"
import type { LineString } from "geojson"
import {
	Entities,
	type EntitiesOptions,
	Entity,
	type Lookup,
} from "./entities"
import type { Point } from "./points"

export interface LineInit {
	id: number
	/** Ids of registered points, in order. */
	refs?: number[]
	tags?: GeoTags | Record<string, unknown>
	/** Geometry read without point reconstruction. */
	geometry?: LineString
}

export type LineCoordinateFormat = "tuples" | "coords" | "lonlat" | "columns"

export type PointTuple = [id: number, lat: number, lon: number]

export interface LineColumns {
	ids: Float64Array
	lats: Float64Array
	lons: Float64Array
}

/**
 * An ordered sequence of points.
 *
 * The bbox grows on `append` and is recomputed from the remaining points on `remove`. A line read without points
 * carries only its geometry handle; its bbox comes from the handle until a point is appended.
 */
export class Line extends Entity {
	readonly type = "line"
	/** Neighbor line id -> ids of the points shared with it. Filled by `recomputeNeighbors`. */
	readonly neighborLines = new Map<number, number[]>()
	readonly #points: Lookup<Point>
	#refs: number[] = []
	#bbox: GeoBbox2D | null = null
	#geometry: LineString | null = null
	#geometryBbox: GeoBbox2D | null = null

	/**
	 * Every ref is resolved and the geometry checked before any point gets a back-reference, so a line that fails to
	 * construct leaves its points untouched.
	 */
	constructor(points: Lookup<Point>, { id, refs = [], tags, geometry }: LineInit) {
		super(id, tags)
		this.#points = points
		const geometryBbox = geometry
			? bboxFromLonLats(geometry.coordinates.map(toLonLat))
			: null
		const resolved = refs.map((ref) => {
			const point = points.get(ref)
			if (point === null)
				throw new ValidationError(`Point ${ref} is not registered`)
			return point
		})
		for (const point of resolved) this.append(point)
		if (geometry) {
			this.#geometry = geometry
			this.#geometryBbox = geometryBbox
		}
	}

	get refs(): readonly number[] {
		return this.#refs
	}

	get length() {
		return this.#refs.length
	}

	get isClosed() {
		return this.#refs.length >= 2 && this.#refs[0] === this.#refs.at(-1)
	}

	get geometry() {
		return this.#geometry
	}

	bbox(): GeoBbox2D | null {
		const bbox = this.#bbox ?? this.#geometryBbox
		return bbox && [...bbox]
	}

	/**
	 * Resolve the point ids through the point registry.
	 */
	points(): Point[] {
		return this.#refs.map((ref) => {
			const point = this.#points.get(ref)
			if (point === null)
				throw new StructuralError(`Line ${this.id} references missing point ${ref}`)
			return point
		})
	}

	/**
	 * Append a registered point and extend the bbox.
	 */
	append(point: Point | null | undefined) {
		if (point === null || point === undefined)
			throw new ValidationError(`Cannot append a missing point to line ${this.id}`)
		if (this.#points.get(point.id) !== point)
			throw new ValidationError(`Point ${point.id} is not registered`)
		this.#refs.push(point.id)
		point.lineIds.add(this.id)
		this.#bbox = extendBbox(this.#bbox, point.lon, point.lat)
		this.#dropGeometry()
	}

	/**
	 * Remove the first occurrence of `point`. The back-reference goes once no occurrence is left.
	 * @returns Whether the point was part of the line.
	 */
	remove(point: Point): boolean {
		const index = this.#refs.indexOf(point.id)
		if (index === -1) return false
		this.#refs.splice(index, 1)
		if (!this.#refs.includes(point.id)) point.lineIds.delete(this.id)
		this.refreshBbox()
		this.#dropGeometry()
		return true
	}

	/**
	 * Remove every occurrence of `point`.
	 */
	removeAll(point: Point) {
		const before = this.#refs.length
		this.#refs = this.#refs.filter((ref) => ref !== point.id)
		point.lineIds.delete(this.id)
		if (this.#refs.length === before) return false
		this.refreshBbox()
		this.#dropGeometry()
		return true
	}

	refreshBbox() {
		this.#bbox = bboxFromLonLats(this.points().map((point) => point.lonLat()))
	}

	/**
	 * Rebuild `neighborLines` from the memberships of this line's points.
	 */
	recomputeNeighbors() {
		this.neighborLines.clear()
		for (const point of this.points()) {
			for (const lineId of point.lineIds) {
				if (lineId === this.id) continue
				const shared = this.neighborLines.get(lineId)
				if (shared === undefined) this.neighborLines.set(lineId, [point.id])
				else if (!shared.includes(point.id)) shared.push(point.id)
			}
		}
	}

	/**
	 * Drop the back-references this line holds on its points, except for the ids in `keep`.
	 */
	releasePoints(keep?: ReadonlySet<number>) {
		for (const ref of new Set(this.#refs)) {
			if (keep?.has(ref)) continue
			this.#points.get(ref)?.lineIds.delete(this.id)
		}
	}

	/**
	 * Export the points of the line.
	 * - `tuples`: `[id, lat, lon]` per point
	 * - `coords`: `[lat, lon]` per point
	 * - `lonlat`: `[lon, lat]` per point
	 * - `columns`: parallel typed arrays of ids, latitudes and longitudes
	 */
	coordinates(format: "tuples"): PointTuple[]
	coordinates(format: "coords"): LatLon[]
	coordinates(format: "lonlat"): LonLat[]
	coordinates(format: "columns"): LineColumns
	coordinates(
		format: LineCoordinateFormat,
	): PointTuple[] | LatLon[] | LonLat[] | LineColumns {
		const points = this.points()
		switch (format) {
			case "tuples":
				return points.map((point): PointTuple => [point.id, point.lat, point.lon])
			case "coords":
				return points.map((point) => point.latLon())
			case "lonlat":
				return points.map((point) => point.lonLat())
			case "columns": {
				const ids = new Float64Array(points.length)
				const lats = new Float64Array(points.length)
				const lons = new Float64Array(points.length)
				points.forEach((point, i) => {
					ids[i] = point.id
					lats[i] = point.lat
					lons[i] = point.lon
				})
				return { ids, lats, lons }
			}
		}
	}

	/**
	 * Mean latitude and longitude of the points, `null` for an empty line.
	 */
	center(): LatLon | null {
		const points = this.points()
		if (points.length === 0) return null
		let lat = 0
		let lon = 0
		for (const point of points) {
			lat += point.lat
			lon += point.lon
		}
		return [lat / points.length, lon / points.length]
	}

	#dropGeometry() {
		this.#geometry = null
		this.#geometryBbox = null
	}
}

export class Lines extends Entities<Line> {
	readonly points: Lookup<Point>

	constructor(points: Lookup<Point>, options: Partial<EntitiesOptions> = {}) {
		super("line", options)
		this.points = points
	}

	addLine(init: LineInit): Line {
		return this.add(new Line(this.points, init))
	}

	/**
	 * Rebuild the neighbor map of every line.
	 */
	recomputeNeighbors() {
		for (const line of this) line.recomputeNeighbors()
	}

	protected replaced(existing: Line, replacement: Line) {
		existing.releasePoints(new Set(replacement.refs))
	}

	protected detach(line: Line) {
		line.releasePoints()
		for (const other of this) other.neighborLines.delete(line.id)
	}
}
