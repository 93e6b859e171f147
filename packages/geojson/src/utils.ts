import { IOError, ValidationError } from "@tidemark/shared/errors"
import { validateCollection } from "./schema"
import type { InterchangeCollection, InterchangeData } from "./types"

/**
 * Read data as an interchange FeatureCollection.
 * Supports JSON text, UTF-8 bytes and already-parsed objects.
 *
 * @param source - Where the data came from, reported on `IOError`.
 * @throws IOError when the data is not JSON or not an interchange FeatureCollection.
 */
export function parseFeatureCollection(
	data: InterchangeData,
	source = "<memory>",
): InterchangeCollection {
	let value: unknown = data
	if (typeof data === "string" || data instanceof Uint8Array || data instanceof ArrayBuffer) {
		const text =
			typeof data === "string" ? data : new TextDecoder().decode(data)
		try {
			value = JSON.parse(text)
		} catch (error) {
			throw new IOError(`Invalid JSON in ${source}`, source, { cause: error })
		}
	}
	const result = validateCollection(value)
	if (!result.success)
		throw new IOError(
			`${source} is not an interchange FeatureCollection:\n${result.issues.join("\n")}`,
			source,
		)
	return result.data
}

/**
 * Numeric id of a feature. Numeric strings are parsed.
 * @returns `undefined` when the feature has no usable id.
 */
export function extractFeatureId(
	featureId: string | number | undefined,
): number | undefined {
	if (typeof featureId === "number")
		return Number.isSafeInteger(featureId) ? featureId : undefined
	if (typeof featureId === "string" && /^-?\d+$/.test(featureId.trim())) {
		const id = Number.parseInt(featureId, 10)
		if (Number.isSafeInteger(id)) return id
	}
	return undefined
}

/**
 * The `id_nodes` of a line-like feature: a flat array of ids.
 */
export function flatIdNodes(
	idNodes: number[] | number[][] | undefined,
): number[] | undefined {
	if (idNodes === undefined) return undefined
	const flat: number[] = []
	for (const id of idNodes) {
		if (typeof id !== "number") return undefined
		flat.push(id)
	}
	return flat
}

/**
 * The `id_nodes` of a polygon feature: one array of ids per ring.
 */
export function ringIdNodes(
	idNodes: number[] | number[][] | undefined,
): number[][] | undefined {
	if (idNodes === undefined) return undefined
	const rings: number[][] = []
	for (const ring of idNodes) {
		if (typeof ring === "number") return undefined
		rings.push(ring)
	}
	return rings
}

/**
 * Numeric id of a feature, or a `ValidationError` naming its position in the collection.
 */
export function requireFeatureId(
	featureId: string | number | undefined,
	index: number,
): number {
	const id = extractFeatureId(featureId)
	if (id === undefined)
		throw new ValidationError(
			`Feature at index ${index} has no numeric id: ${String(featureId)}`,
		)
	return id
}
