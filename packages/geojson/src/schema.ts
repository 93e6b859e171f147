/**
 * Runtime validation of interchange documents.
 * @module
 */

import { z } from "zod"
import type { InterchangeCollection, InterchangeProperties } from "./types"

const PositionSchema = z.array(z.number().finite()).min(2)

const GeometrySchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("Point"), coordinates: PositionSchema }),
	z.object({ type: z.literal("MultiPoint"), coordinates: z.array(PositionSchema) }),
	z.object({ type: z.literal("LineString"), coordinates: z.array(PositionSchema) }),
	z.object({
		type: z.literal("MultiLineString"),
		coordinates: z.array(z.array(PositionSchema)),
	}),
	z.object({
		type: z.literal("Polygon"),
		coordinates: z.array(z.array(PositionSchema)),
	}),
	z.object({
		type: z.literal("MultiPolygon"),
		coordinates: z.array(z.array(z.array(PositionSchema))),
	}),
])

const BboxSchema = z.union([
	z.tuple([z.number(), z.number(), z.number(), z.number()]),
	z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()]),
])

// Upstream decoders occasionally emit numeric tag values; they are stored as strings.
const TagsSchema = z.record(z.union([z.string(), z.number()]).transform(String))

const PropertiesSchema = z
	.object({
		tags: TagsSchema.optional(),
		id_nodes: z
			.union([z.array(z.number()), z.array(z.array(z.number()))])
			.optional(),
	})
	.passthrough()
	.nullish()
	.transform((properties): InterchangeProperties => properties ?? {})

export const InterchangeFeatureSchema = z.object({
	type: z.literal("Feature"),
	id: z.union([z.number(), z.string()]).optional(),
	bbox: BboxSchema.optional(),
	geometry: GeometrySchema,
	properties: PropertiesSchema,
})

export const InterchangeCollectionSchema = z.object({
	type: z.literal("FeatureCollection"),
	bbox: BboxSchema.optional(),
	features: z.array(InterchangeFeatureSchema),
})

/**
 * Validate a parsed JSON value as an interchange FeatureCollection.
 * @returns The collection, or the validation issues as readable lines.
 */
export function validateCollection(
	value: unknown,
): { success: true; data: InterchangeCollection } | { success: false; issues: string[] } {
	const result = InterchangeCollectionSchema.safeParse(value)
	if (result.success) return { success: true, data: result.data }
	return {
		success: false,
		issues: result.error.issues.map(
			(issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
		),
	}
}
