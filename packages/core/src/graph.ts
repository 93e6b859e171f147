import { mergeBboxes } from "@tidemark/shared/bbox"
import { consoleLogger, type Logger } from "@tidemark/shared/log"
import type { GeoBbox2D } from "@tidemark/shared/types"
import { type Line, Lines } from "./lines"
import { type Point, Points } from "./points"
import { type Polygon, Polygons } from "./polygons"

/**
 * A point as supplied by an upstream decoder.
 */
export interface PointRecord {
	id: number
	lon: number
	lat: number
}

export interface LineRecord {
	id: number
	points: PointRecord[]
	tags?: Record<string, unknown>
}

export interface PolygonRecord {
	id: number
	outer: PointRecord[]
	inner?: PointRecord[][]
	tags?: Record<string, unknown>
}

export interface GraphInfo {
	id: string
	bbox: GeoBbox2D | null
	stats: {
		points: number
		lines: number
		polygons: number
	}
}

export interface GraphOptions {
	id: string
	logger: Logger
}

export interface GraphQueryResult {
	points: Point[]
	lines: Line[]
	polygons: Polygon[]
}

/**
 * Point, line and polygon registries sharing one point registry.
 */
export class Graph {
	// Filename or ID of this graph.
	readonly id: string
	readonly points: Points
	readonly lines: Lines
	readonly polygons: Polygons

	constructor(opts: Partial<GraphOptions> = {}) {
		this.id = opts.id ?? "unknown"
		const logger = opts.logger ?? consoleLogger
		this.points = new Points({ logger })
		this.lines = new Lines(this.points, { logger })
		this.polygons = new Polygons(this.points, { logger })
		this.points.link({ lines: this.lines, polygons: this.polygons })
	}

	/**
	 * Aggregate bbox of every entity, `null` when nothing has a bbox.
	 */
	bbox(): GeoBbox2D | null {
		return mergeBboxes([
			this.points.bbox(),
			this.lines.bbox(),
			this.polygons.bbox(),
		])
	}

	isEmpty() {
		return (
			this.points.size === 0 &&
			this.lines.size === 0 &&
			this.polygons.size === 0
		)
	}

	info(): GraphInfo {
		return {
			id: this.id,
			bbox: this.bbox(),
			stats: {
				points: this.points.size,
				lines: this.lines.size,
				polygons: this.polygons.size,
			},
		}
	}

	/**
	 * Entities of every kind whose bbox overlaps `bbox`, edges included.
	 */
	queryBbox(bbox: GeoBbox2D): GraphQueryResult {
		return {
			points: this.points.queryBbox(bbox),
			lines: this.lines.queryBbox(bbox),
			polygons: this.polygons.queryBbox(bbox),
		}
	}

	/**
	 * Add a decoded line. Points already in the registry are reused as they are.
	 */
	addLineRecord({ id, points, tags }: LineRecord): Line {
		const refs = points.map((record) => this.#upsertPoint(record).id)
		return this.lines.addLine({ id, refs, tags })
	}

	/**
	 * Add a decoded polygon. Points already in the registry are reused as they are.
	 */
	addPolygonRecord({ id, outer, inner = [], tags }: PolygonRecord): Polygon {
		const toRefs = (ring: PointRecord[]) =>
			ring.map((record) => this.#upsertPoint(record).id)
		return this.polygons.addPolygon({
			id,
			outer: toRefs(outer),
			inner: inner.map(toRefs),
			tags,
		})
	}

	/**
	 * Rebuild the neighbor map of every line.
	 */
	recomputeNeighbors() {
		this.lines.recomputeNeighbors()
	}

	#upsertPoint({ id, lon, lat }: PointRecord): Point {
		return this.points.get(id) ?? this.points.addPoint({ id, lat, lon })
	}
}
