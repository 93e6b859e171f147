import {
	lineFeature,
	pointFeature,
	polygonFeature,
	rectangle,
} from "@tidemark/geojson/test/fixtures"
import type { InterchangeFeature } from "@tidemark/geojson/types"
import { ValidationError } from "@tidemark/shared/errors"
import { silentLogger } from "@tidemark/shared/log"
import { describe, expect, it, vi } from "vitest"
import {
	featureToGeofence,
	type GeofenceRect,
	type GeofenceStore,
	loadGeofences,
} from "../src/geofence"

interface StoredGeofence {
	id: number
	name: string
	rect: GeofenceRect
	wkt: string
}

/**
 * In-memory store that records every call and fails to insert the geofence named `failOn`.
 */
class MemoryGeofenceStore implements GeofenceStore {
	readonly calls: string[] = []
	readonly rows: StoredGeofence[] = []
	private pending: StoredGeofence | null = null
	private nextId = 1

	constructor(private readonly failOn?: string) {}

	async begin() {
		this.calls.push("begin")
	}

	async insertGeofence({ name, rect }: { name: string; rect: GeofenceRect }) {
		this.calls.push(`insertGeofence ${name}`)
		if (name === this.failOn) throw Error(`cannot insert ${name}`)
		const id = this.nextId++
		this.pending = { id, name, rect, wkt: "" }
		return id
	}

	async insertGeometry(geofenceId: number, wkt: string) {
		this.calls.push(`insertGeometry ${geofenceId}`)
		const pending = this.pending
		if (pending === null || pending.id !== geofenceId)
			throw Error(`unknown geofence ${geofenceId}`)
		pending.wkt = wkt
	}

	async commit() {
		this.calls.push("commit")
		if (this.pending) this.rows.push(this.pending)
		this.pending = null
	}

	async rollback() {
		this.calls.push("rollback")
		this.pending = null
	}
}

/**
 * Store whose first transaction cannot start, so rolling it back fails as well.
 */
class DroppedConnectionStore extends MemoryGeofenceStore {
	private started = 0
	private open = false

	override async begin() {
		await super.begin()
		this.started++
		if (this.started === 1) throw Error("connection reset")
		this.open = true
	}

	override async commit() {
		await super.commit()
		this.open = false
	}

	override async rollback() {
		await super.rollback()
		if (!this.open) throw Error("no transaction in progress")
		this.open = false
	}
}

describe("featureToGeofence", () => {
	it("converts a named polygon", () => {
		const harbor = polygonFeature(1, [rectangle(5, 43, 6, 44)], { name: "Harbor" })
		expect(featureToGeofence(harbor)).toEqual({
			name: "Harbor",
			rect: { rtLat: 44, rtLon: 6, lbLat: 43, lbLon: 5 },
			wkt: "POLYGON ((5 43, 6 43, 6 44, 5 44, 5 43))",
		})
	})

	it("prefers the feature bbox and names unnamed features", () => {
		const pier: InterchangeFeature = {
			...lineFeature(2, [
				[0, 1],
				[2, 3],
			]),
			bbox: [-1, 0, 0, 4, 5, 10],
		}
		expect(featureToGeofence(pier)).toEqual({
			name: "Unnamed",
			rect: { rtLat: 5, rtLon: 4, lbLat: 0, lbLon: -1 },
			wkt: "LINESTRING (0 1, 2 3)",
		})
	})

	it("rejects points", () => {
		expect(() => featureToGeofence(pointFeature(3, [1, 2]))).toThrow(
			new ValidationError("Geofences need a LineString or Polygon, got Point"),
		)
	})
})

describe("loadGeofences", () => {
	it("writes one transaction per feature and rolls back failures", async () => {
		const store = new MemoryGeofenceStore("Breakwater")
		const logger = vi.fn()
		const result = await loadGeofences(
			[
				polygonFeature(1, [rectangle(0, 0, 1, 1)], { name: "Harbor" }),
				lineFeature(
					2,
					[
						[0, 0],
						[1, 0],
					],
					[1, 2],
					{ name: "Breakwater" },
				),
				pointFeature(3, [0.5, 0.5]),
				polygonFeature(4, [rectangle(2, 2, 3, 3)], { name: "Lagoon" }),
			],
			store,
			{ logger },
		)

		expect(result).toEqual({
			loaded: [
				{ featureId: 1, geofenceId: 1 },
				{ featureId: 4, geofenceId: 2 },
			],
			failed: [
				{ featureId: 2, error: "cannot insert Breakwater" },
				{
					featureId: 3,
					error: "Geofences need a LineString or Polygon, got Point",
				},
			],
		})
		expect(store.calls).toEqual([
			"begin",
			"insertGeofence Harbor",
			"insertGeometry 1",
			"commit",
			"begin",
			"insertGeofence Breakwater",
			"rollback",
			"begin",
			"insertGeofence Lagoon",
			"insertGeometry 2",
			"commit",
		])
		expect(store.rows.map(({ name, wkt }) => [name, wkt])).toEqual([
			["Harbor", "POLYGON ((0 0, 1 0, 1 1, 0 1, 0 0))"],
			["Lagoon", "POLYGON ((2 2, 3 2, 3 3, 2 3, 2 2))"],
		])
		expect(logger).toHaveBeenCalledWith(
			"Geofence 2 rolled back: cannot insert Breakwater",
			"error",
		)
		expect(logger).toHaveBeenCalledWith("Loaded 2 geofences, 2 failed", "info")
	})

	it("keeps going when a rollback fails", async () => {
		const store = new DroppedConnectionStore()
		const logger = vi.fn()
		const result = await loadGeofences(
			[
				polygonFeature(1, [rectangle(0, 0, 1, 1)], { name: "Harbor" }),
				polygonFeature(2, [rectangle(2, 2, 3, 3)], { name: "Lagoon" }),
			],
			store,
			{ logger },
		)

		expect(result).toEqual({
			loaded: [{ featureId: 2, geofenceId: 1 }],
			failed: [
				{
					featureId: 1,
					error: "connection reset (rollback failed: no transaction in progress)",
				},
			],
		})
		expect(store.calls).toEqual([
			"begin",
			"rollback",
			"begin",
			"insertGeofence Lagoon",
			"insertGeometry 1",
			"commit",
		])
		expect(logger).toHaveBeenCalledWith(
			"Geofence 1 failed: connection reset (rollback failed: no transaction in progress)",
			"error",
		)
	})

	it("loads nothing from an empty list", async () => {
		const store = new MemoryGeofenceStore()
		const result = await loadGeofences([], store, { logger: silentLogger })
		expect(result).toEqual({ loaded: [], failed: [] })
		expect(store.calls).toEqual([])
	})
})
