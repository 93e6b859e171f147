/**
 * Base classes shared by points, lines and polygons and by their registries.
 *
 * Entities reference each other by id. A registry owns the entities of one kind and resolves those ids; removing an
 * entity from its registry detaches it from every entity that referenced it.
 *
 * @module
 */

import { bboxOverlaps, mergeBboxes } from "@tidemark/shared/bbox"
import { ValidationError } from "@tidemark/shared/errors"
import { consoleLogger, type Logger } from "@tidemark/shared/log"
import type { GeoBbox2D, GeoEntityType, GeoTags } from "@tidemark/shared/types"
import { Tags } from "./tags"

export function validateId(id: unknown): asserts id is number {
	if (typeof id !== "number" || !Number.isSafeInteger(id))
		throw new ValidationError(`Entity id must be an integer, got ${String(id)}`)
}

/**
 * Id, tags and bounding box common to every entity.
 */
export abstract class Entity {
	abstract readonly type: GeoEntityType
	readonly id: number
	readonly tags: Tags

	constructor(id: number, tags?: GeoTags | Record<string, unknown>) {
		validateId(id)
		this.id = id
		this.tags = new Tags(tags)
	}

	/**
	 * Set a tag. Numbers are stored as strings; any other non-string value throws a `ValidationError`.
	 */
	addTag(key: string, value: unknown) {
		this.tags.set(key, value)
	}

	getTag(key: string) {
		return this.tags.get(key)
	}

	hasTag(key: string) {
		return this.tags.has(key)
	}

	removeTag(key: string) {
		return this.tags.delete(key)
	}

	clearTags() {
		this.tags.clear()
	}

	/**
	 * `[minLon, minLat, maxLon, maxLat]`, or `null` while the entity has no coordinates.
	 */
	abstract bbox(): GeoBbox2D | null
}

/**
 * Anything that resolves entity ids. Registries satisfy it.
 */
export interface Lookup<T> {
	get(id: number): T | null
}

export interface EntitiesOptions {
	logger: Logger
}

/**
 * Abstract id -> entity store.
 *
 * Re-adding an id replaces the stored entity (last write wins) and logs a warning. Subclasses decide what happens to
 * the references held by the replaced or removed entity.
 */
export abstract class Entities<T extends Entity>
	implements Iterable<T>, Lookup<T>
{
	/** The kind of entity stored in this registry. */
	readonly type: GeoEntityType
	protected readonly log: Logger
	protected readonly byId = new Map<number, T>()

	constructor(type: GeoEntityType, options: Partial<EntitiesOptions> = {}) {
		this.type = type
		this.log = options.logger ?? consoleLogger
	}

	/** Number of entities in this registry. */
	get size() {
		return this.byId.size
	}

	/**
	 * Clean up after `existing` was replaced by `replacement` under the same id.
	 */
	protected abstract replaced(existing: T, replacement: T): void

	/**
	 * Remove every reference other entities hold to `entity`.
	 */
	protected abstract detach(entity: T): void

	/**
	 * Store an entity, replacing any entity with the same id.
	 */
	add(entity: T): T {
		const existing = this.byId.get(entity.id)
		if (existing === entity) return entity
		if (existing) {
			this.log(`${this.type} ${entity.id} already exists, overwriting`, "warn")
			this.byId.set(entity.id, entity)
			this.replaced(existing, entity)
			return entity
		}
		this.byId.set(entity.id, entity)
		return entity
	}

	get(id: number): T | null {
		return this.byId.get(id) ?? null
	}

	has(id: number) {
		return this.byId.has(id)
	}

	/**
	 * Remove an entity and detach it from everything that referenced it.
	 * @returns The removed entity, or `null` when the id is unknown.
	 */
	remove(id: number): T | null {
		const entity = this.byId.get(id)
		if (entity === undefined) return null
		this.detach(entity)
		this.byId.delete(id)
		return entity
	}

	/**
	 * Remove every entity, detaching each one.
	 */
	clear() {
		for (const id of [...this.byId.keys()]) this.remove(id)
	}

	ids() {
		return this.byId.keys()
	}

	[Symbol.iterator](): Iterator<T> {
		return this.byId.values()
	}

	/**
	 * Search for entities with a specific tag key and optional value.
	 */
	search(key: string, value?: string): T[] {
		const entities: T[] = []
		for (const entity of this.byId.values()) {
			if (entity.tags.matches(key, value)) entities.push(entity)
		}
		return entities
	}

	/**
	 * Aggregate bounding box of every entity that has one.
	 */
	bbox(): GeoBbox2D | null {
		return mergeBboxes(Array.from(this.byId.values(), (entity) => entity.bbox()))
	}

	/**
	 * Every entity whose bounding box overlaps `bbox`, edges included. Linear scan.
	 */
	queryBbox(bbox: GeoBbox2D): T[] {
		const entities: T[] = []
		for (const entity of this.byId.values()) {
			const entityBbox = entity.bbox()
			if (entityBbox && bboxOverlaps(entityBbox, bbox)) entities.push(entity)
		}
		return entities
	}
}
