import { ValidationError } from "@tidemark/shared/errors"
import type { GeoTags } from "@tidemark/shared/types"

/**
 * Normalize a tag value to its stored string form. Only strings and finite numbers are accepted.
 */
export function tagValue(key: string, value: unknown): string {
	if (typeof value === "string") return value
	if (typeof value === "number" && Number.isFinite(value)) return String(value)
	throw new ValidationError(
		`Tag "${key}" must have a string or numeric value, got ${typeof value}`,
	)
}

export function validateTagKey(key: unknown): asserts key is string {
	if (typeof key !== "string" || key.trim() === "")
		throw new ValidationError("Tag key must be a non-empty string")
}

/**
 * String-keyed tag map of a single entity.
 */
export class Tags {
	private readonly values = new Map<string, string>()

	constructor(tags?: Record<string, unknown>) {
		if (tags) {
			for (const [key, value] of Object.entries(tags)) this.set(key, value)
		}
	}

	get size() {
		return this.values.size
	}

	set(key: string, value: unknown) {
		validateTagKey(key)
		this.values.set(key, tagValue(key, value))
	}

	get(key: string): string | undefined {
		return this.values.get(key)
	}

	has(key: string) {
		return this.values.has(key)
	}

	delete(key: string) {
		return this.values.delete(key)
	}

	clear() {
		this.values.clear()
	}

	/**
	 * Whether the tag `key` is present and, when `value` is given, equal to it.
	 */
	matches(key: string, value?: string) {
		const actual = this.values.get(key)
		if (actual === undefined) return false
		return value === undefined || actual === value
	}

	entries() {
		return this.values.entries()
	}

	toObject(): GeoTags {
		return Object.fromEntries(this.values)
	}
}
