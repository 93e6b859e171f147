import { ValidationError } from "./errors"
import type { LonLat } from "./types"

export const MIN_LAT = -90
export const MAX_LAT = 90
export const MIN_LON = -180
export const MAX_LON = 180

/**
 * Throw a `ValidationError` unless `lat` is within [-90, 90] and `lon` within [-180, 180].
 * NaN fails both checks.
 */
export function validateLatLon(lat: number, lon: number) {
	if (!(lat >= MIN_LAT && lat <= MAX_LAT))
		throw new ValidationError(
			`Latitude must be within [${MIN_LAT}, ${MAX_LAT}], got ${lat}`,
		)
	if (!(lon >= MIN_LON && lon <= MAX_LON))
		throw new ValidationError(
			`Longitude must be within [${MIN_LON}, ${MAX_LON}], got ${lon}`,
		)
}

/**
 * Read a `[lon, lat]` pair out of an untyped GeoJSON position.
 */
export function toLonLat(position: readonly unknown[]): LonLat {
	const [lon, lat] = position
	if (
		typeof lon !== "number" ||
		typeof lat !== "number" ||
		!Number.isFinite(lon) ||
		!Number.isFinite(lat)
	)
		throw new ValidationError(`Invalid position: ${JSON.stringify(position)}`)
	return [lon, lat]
}
