import { validateLatLon } from "@tidemark/shared/coordinates"
import { StructuralError, ValidationError } from "@tidemark/shared/errors"
import type { GeoBbox2D, GeoTags, LatLon, LonLat } from "@tidemark/shared/types"
import {
	Entities,
	type EntitiesOptions,
	Entity,
	type Lookup,
} from "./entities"
import type { Line } from "./lines"
import type { Polygon } from "./polygons"

export interface PointInit {
	id: number
	lat: number
	lon: number
	tags?: GeoTags | Record<string, unknown>
}

/**
 * A coordinate with back-references to the lines and polygons that use it and to its neighbor points.
 *
 * The membership sets are live: registries and lines mutate them in place.
 */
export class Point extends Entity {
	readonly type = "point"
	readonly lineIds = new Set<number>()
	readonly polygonIds = new Set<number>()
	readonly neighborIds = new Set<number>()
	#lat: number
	#lon: number

	constructor({ id, lat, lon, tags }: PointInit) {
		super(id, tags)
		validateLatLon(lat, lon)
		this.#lat = lat
		this.#lon = lon
	}

	get lat() {
		return this.#lat
	}

	get lon() {
		return this.#lon
	}

	/**
	 * Move the point. Lines and polygons keep their cached bbox; `Points.move` refreshes them too.
	 */
	setCoordinates(lat: number, lon: number) {
		validateLatLon(lat, lon)
		this.#lat = lat
		this.#lon = lon
	}

	lonLat(): LonLat {
		return [this.#lon, this.#lat]
	}

	latLon(): LatLon {
		return [this.#lat, this.#lon]
	}

	bbox(): GeoBbox2D {
		return [this.#lon, this.#lat, this.#lon, this.#lat]
	}

	get degree() {
		return this.neighborIds.size
	}

	get isConnected() {
		return this.neighborIds.size > 0
	}

	/** Not used by any line or polygon and without neighbors. */
	get isIsolated() {
		return (
			this.lineIds.size === 0 &&
			this.polygonIds.size === 0 &&
			this.neighborIds.size === 0
		)
	}

	/**
	 * Link two points. Both sides are updated.
	 */
	addNeighbor(other: Point) {
		if (other.id === this.id)
			throw new ValidationError(`Point ${this.id} cannot neighbor itself`)
		this.neighborIds.add(other.id)
		other.neighborIds.add(this.id)
	}

	/**
	 * Unlink two points. Both sides are updated.
	 */
	removeNeighbor(other: Point) {
		const removed = this.neighborIds.delete(other.id)
		other.neighborIds.delete(this.id)
		return removed
	}

	isNeighbor(other: Point) {
		return this.neighborIds.has(other.id)
	}

	/**
	 * Take over the memberships of a point this one replaces under the same id.
	 */
	adoptMemberships(previous: Point) {
		for (const id of previous.lineIds) this.lineIds.add(id)
		for (const id of previous.polygonIds) this.polygonIds.add(id)
		for (const id of previous.neighborIds) this.neighborIds.add(id)
	}
}

/**
 * The registries a point registry cascades removals into.
 */
export interface PointMembers {
	lines: Lookup<Line>
	polygons: Lookup<Polygon>
}

export class Points extends Entities<Point> {
	private members: PointMembers | null = null

	constructor(options: Partial<EntitiesOptions> = {}) {
		super("point", options)
	}

	/**
	 * Connect the registries that reference these points. Required before removing or moving a point that is used
	 * by a line or polygon.
	 */
	link(members: PointMembers) {
		this.members = members
	}

	addPoint(init: PointInit): Point {
		return this.add(new Point(init))
	}

	/**
	 * Move a point and refresh the bbox of every line and polygon using it.
	 */
	move(id: number, lat: number, lon: number) {
		const point = this.get(id)
		if (point === null) throw new ValidationError(`Point ${id} is not registered`)
		point.setCoordinates(lat, lon)
		this.refreshOwners(point)
		return point
	}

	/**
	 * Remove every isolated point.
	 * @returns The removed points.
	 */
	removeIsolated(): Point[] {
		const removed: Point[] = []
		for (const point of [...this.byId.values()]) {
			if (!point.isIsolated) continue
			this.byId.delete(point.id)
			removed.push(point)
		}
		return removed
	}

	/**
	 * The replacement may sit elsewhere, so the lines and polygons using the id get their bbox refreshed.
	 */
	protected replaced(existing: Point, replacement: Point) {
		replacement.adoptMemberships(existing)
		this.refreshOwners(replacement)
	}

	protected detach(point: Point) {
		if (point.lineIds.size > 0 || point.polygonIds.size > 0) {
			const { lines, polygons } = this.requireMembers(point)
			for (const lineId of [...point.lineIds]) {
				const line = lines.get(lineId)
				if (line === null) point.lineIds.delete(lineId)
				else line.removeAll(point)
			}
			for (const polygonId of [...point.polygonIds]) {
				const polygon = polygons.get(polygonId)
				if (polygon === null) point.polygonIds.delete(polygonId)
				else polygon.removePoint(point)
			}
		}
		for (const neighborId of [...point.neighborIds]) {
			const neighbor = this.get(neighborId)
			if (neighbor) point.removeNeighbor(neighbor)
			else point.neighborIds.delete(neighborId)
		}
	}

	private refreshOwners(point: Point) {
		if (point.lineIds.size === 0 && point.polygonIds.size === 0) return
		const { lines, polygons } = this.requireMembers(point)
		for (const lineId of point.lineIds) lines.get(lineId)?.refreshBbox()
		for (const polygonId of point.polygonIds)
			polygons.get(polygonId)?.refreshBbox()
	}

	private requireMembers(point: Point): PointMembers {
		if (this.members === null)
			throw new StructuralError(
				`Point ${point.id} is used by lines or polygons, but the point registry is not linked to them`,
			)
		return this.members
	}
}
