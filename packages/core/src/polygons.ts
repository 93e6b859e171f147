import { bboxFromLonLats } from "@tidemark/shared/bbox"
import { toLonLat } from "@tidemark/shared/coordinates"
import { StructuralError, ValidationError } from "@tidemark/shared/errors"
import { type GeometryEngine, turfGeometry } from "@tidemark/shared/geometry"
import type { GeoBbox2D, GeoTags, LonLat } from "@tidemark/shared/types"
import type { Polygon as GeoJSONPolygon, Position } from "geojson"
import {
	Entities,
	type EntitiesOptions,
	Entity,
	type Lookup,
} from "./entities"
import type { Point } from "./points"

export interface PolygonInit {
	id: number
	/** Ids of registered points forming the outer ring. */
	outer?: number[]
	inner?: number[][]
	tags?: GeoTags | Record<string, unknown>
	/** Geometry read without point reconstruction. */
	geometry?: GeoJSONPolygon
}

/**
 * An outer ring with optional inner rings (holes), each an ordered list of point ids.
 *
 * Inner rings only exist while the outer ring has points. The geometry handle is built from the rings on first use
 * and dropped whenever a ring changes.
 */
export class Polygon extends Entity {
	readonly type = "polygon"
	readonly #points: Lookup<Point>
	#outer: number[] = []
	#inner: number[][] = []
	#bbox: GeoBbox2D | null = null
	#geometry: GeoJSONPolygon | null = null
	#geometryBbox: GeoBbox2D | null = null

	constructor(
		points: Lookup<Point>,
		{ id, outer = [], inner = [], tags, geometry }: PolygonInit,
	) {
		super(id, tags)
		this.#points = points
		// Validate every ring before any point gets a back-reference.
		const geometryBbox = geometry
			? bboxFromLonLats(geometry.coordinates.flat().map(toLonLat))
			: null
		this.#resolve(outer)
		for (const ring of inner) this.#resolveInnerRing(ring, outer.length > 0)
		if (outer.length > 0) this.setOuterRing(outer)
		for (const ring of inner) this.addInnerRing(ring)
		if (geometry) {
			this.#geometry = geometry
			this.#geometryBbox = geometryBbox
		}
	}

	get outer(): readonly number[] {
		return this.#outer
	}

	get inner(): readonly (readonly number[])[] {
		return this.#inner
	}

	/** Outer ring first, then the inner rings. Empty when the outer ring is empty. */
	rings(): readonly (readonly number[])[] {
		if (this.#outer.length === 0) return []
		return [this.#outer, ...this.#inner]
	}

	bbox(): GeoBbox2D | null {
		const bbox = this.#bbox ?? this.#geometryBbox
		return bbox && [...bbox]
	}

	/**
	 * Resolve the point ids of a ring through the point registry.
	 */
	ringPoints(ring: readonly number[]): Point[] {
		return ring.map((ref) => {
			const point = this.#points.get(ref)
			if (point === null)
				throw new StructuralError(
					`Polygon ${this.id} references missing point ${ref}`,
				)
			return point
		})
	}

	/**
	 * Replace the outer ring. An empty ring removes it.
	 */
	setOuterRing(refs: number[]) {
		if (refs.length === 0) {
			this.removeOuterRing()
			return
		}
		const points = this.#resolve(refs)
		const previous = this.#outer
		this.#outer = [...refs]
		for (const point of points) point.polygonIds.add(this.id)
		this.#release(previous)
		this.#changed()
	}

	/**
	 * Remove the outer ring. Inner rings must be cleared first.
	 */
	removeOuterRing() {
		if (this.#inner.length > 0)
			throw new StructuralError(
				`Polygon ${this.id} has inner rings, clear them before removing the outer ring`,
			)
		const previous = this.#outer
		this.#outer = []
		this.#release(previous)
		this.#changed()
	}

	addInnerRing(refs: number[]) {
		const points = this.#resolveInnerRing(refs, this.#outer.length > 0)
		this.#inner.push([...refs])
		for (const point of points) point.polygonIds.add(this.id)
		this.#changed()
	}

	/**
	 * @returns Whether a ring existed at `index`.
	 */
	removeInnerRing(index: number) {
		const [removed] = this.#inner.splice(index, 1)
		if (removed === undefined) return false
		this.#release(removed)
		this.#changed()
		return true
	}

	clearInnerRings() {
		const previous = this.#inner.flat()
		this.#inner = []
		this.#release(previous)
		this.#changed()
	}

	/**
	 * Remove every occurrence of `point` from every ring. Rings left empty are dropped; inner rings go too when the
	 * outer ring is left empty.
	 * @returns Whether the point was part of the polygon.
	 */
	removePoint(point: Point) {
		const before = this.#outer.length + this.#inner.flat().length
		this.#outer = this.#outer.filter((ref) => ref !== point.id)
		this.#inner = this.#inner
			.map((ring) => ring.filter((ref) => ref !== point.id))
			.filter((ring) => ring.length > 0)
		point.polygonIds.delete(this.id)
		if (this.#outer.length === 0 && this.#inner.length > 0) {
			const orphaned = this.#inner.flat()
			this.#inner = []
			this.#release(orphaned)
		}
		const removed = this.#outer.length + this.#inner.flat().length < before
		if (removed) this.#changed()
		return removed
	}

	/**
	 * Recompute the bbox from the current point coordinates. A geometry built from the rings is rebuilt on next use.
	 */
	refreshBbox() {
		if (this.#outer.length > 0) this.#geometry = null
		this.#bbox = bboxFromLonLats(this.#lonLats(this.rings().flat()))
	}

	/**
	 * Drop the back-references this polygon holds on its points, except for the ids in `keep`.
	 */
	releasePoints(keep?: ReadonlySet<number>) {
		for (const ref of new Set(this.rings().flat())) {
			if (keep?.has(ref)) continue
			this.#points.get(ref)?.polygonIds.delete(this.id)
		}
	}

	/**
	 * The polygon as a GeoJSON geometry with closed rings, or `null` without an outer ring or handle.
	 */
	get geometry(): GeoJSONPolygon | null {
		if (this.#geometry === null && this.#outer.length > 0) {
			this.#geometry = {
				type: "Polygon",
				coordinates: this.rings().map((ring) => closeRing(this.#lonLats(ring))),
			}
		}
		return this.#geometry
	}

	/**
	 * Whether a coordinate lies inside the outer ring and outside every hole. Boundary points are inside.
	 */
	containsPoint(
		lat: number,
		lon: number,
		engine: GeometryEngine = turfGeometry,
	) {
		const shape = this.geometry
		if (shape === null) return false
		return engine.pointInPolygon([lon, lat], shape)
	}

	#resolve(refs: number[]) {
		return refs.map((ref) => {
			const point = this.#points.get(ref)
			if (point === null)
				throw new ValidationError(`Point ${ref} is not registered`)
			return point
		})
	}

	#resolveInnerRing(refs: number[], hasOuter: boolean) {
		if (!hasOuter)
			throw new StructuralError(
				`Polygon ${this.id} has no outer ring, cannot add an inner ring`,
			)
		if (refs.length === 0)
			throw new ValidationError(`Inner ring of polygon ${this.id} is empty`)
		return this.#resolve(refs)
	}

	#lonLats(ring: readonly number[]): LonLat[] {
		return this.ringPoints(ring).map((point) => point.lonLat())
	}

	/**
	 * Drop back-references for the given ids that no ring uses anymore.
	 */
	#release(refs: readonly number[]) {
		const remaining = new Set(this.rings().flat())
		for (const ref of refs) {
			if (remaining.has(ref)) continue
			this.#points.get(ref)?.polygonIds.delete(this.id)
		}
	}

	#changed() {
		this.#geometry = null
		this.#geometryBbox = null
		this.refreshBbox()
	}
}

function closeRing(ring: LonLat[]): Position[] {
	const first = ring[0]
	const last = ring.at(-1)
	if (first === undefined || last === undefined) return ring
	if (first[0] === last[0] && first[1] === last[1]) return ring
	return [...ring, first]
}

export class Polygons extends Entities<Polygon> {
	readonly points: Lookup<Point>

	constructor(points: Lookup<Point>, options: Partial<EntitiesOptions> = {}) {
		super("polygon", options)
		this.points = points
	}

	addPolygon(init: PolygonInit): Polygon {
		return this.add(new Polygon(this.points, init))
	}

	/**
	 * Polygons containing a coordinate. Linear scan with a bbox pre-filter.
	 */
	containing(lat: number, lon: number, engine?: GeometryEngine): Polygon[] {
		return this.queryBbox([lon, lat, lon, lat]).filter((polygon) =>
			polygon.containsPoint(lat, lon, engine),
		)
	}

	protected replaced(existing: Polygon, replacement: Polygon) {
		existing.releasePoints(new Set(replacement.rings().flat()))
	}

	protected detach(polygon: Polygon) {
		polygon.releasePoints()
	}
}
