/**
 * Well-known text encoding for interchange geometries.
 *
 * The output is canonical: coordinates keep their order, numbers use the shortest round-trip form and `-0` is
 * written as `0`, so two geometries with the same coordinates always produce the same string.
 *
 * @module
 */

import type { Geometry, Position } from "geojson"
import { toLonLat } from "./coordinates"
import { ValidationError } from "./errors"

function formatPosition(position: Position) {
	const [lon, lat] = toLonLat(position)
	return `${lon} ${lat}`
}

function formatPositions(positions: Position[], minLength: number) {
	if (!Array.isArray(positions) || positions.length < minLength)
		throw new ValidationError(
			`Expected at least ${minLength} positions, got ${Array.isArray(positions) ? positions.length : typeof positions}`,
		)
	return `(${positions.map(formatPosition).join(", ")})`
}

function formatRings(rings: Position[][]) {
	if (!Array.isArray(rings) || rings.length === 0)
		throw new ValidationError("Polygon has no rings")
	return `(${rings.map((ring) => formatPositions(ring, 4)).join(", ")})`
}

/**
 * Encode a geometry as WKT.
 * @throws ValidationError for a missing geometry, an unsupported type, a non-finite coordinate, a line with fewer
 * than 2 positions or a ring with fewer than 4.
 */
export function geometryToWkt(geometry: Geometry | null | undefined): string {
	if (geometry == null) throw new ValidationError("Geometry is missing")
	switch (geometry.type) {
		case "Point":
			return `POINT (${formatPosition(geometry.coordinates)})`
		case "MultiPoint":
			if (geometry.coordinates.length === 0)
				throw new ValidationError("MultiPoint has no points")
			return `MULTIPOINT (${geometry.coordinates.map((position) => `(${formatPosition(position)})`).join(", ")})`
		case "LineString":
			return `LINESTRING ${formatPositions(geometry.coordinates, 2)}`
		case "MultiLineString":
			if (geometry.coordinates.length === 0)
				throw new ValidationError("MultiLineString has no lines")
			return `MULTILINESTRING (${geometry.coordinates.map((line) => formatPositions(line, 2)).join(", ")})`
		case "Polygon":
			return `POLYGON ${formatRings(geometry.coordinates)}`
		case "MultiPolygon":
			if (geometry.coordinates.length === 0)
				throw new ValidationError("MultiPolygon has no polygons")
			return `MULTIPOLYGON (${geometry.coordinates.map(formatRings).join(", ")})`
		default:
			throw new ValidationError(
				`Unsupported geometry type: ${String(geometry.type)}`,
			)
	}
}
