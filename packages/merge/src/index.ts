/**
 * Merge overlapping interchange extracts into one dataset.
 *
 * - **Deduplicate**: `deduplicateByTag` keeps one feature per source id, `deduplicateGeometries` one per geometry.
 * - **Chain**: `chainLines` stitches lines sharing endpoint ids; `chainCoastline` does so for the coastline.
 * - **Prune**: `pruneCoveredLines` and `pruneInnerRings` drop boundaries represented twice.
 * - **Split**: `splitToGrid` clips a polygon into grid cells.
 * - **Export**: `loadGeofences` writes features as geofence rows.
 *
 * @example
 * ```ts
 * import { readGeoJSONFile, writeGeoJSONFile } from "@tidemark/geojson"
 * import { mergeExtracts } from "@tidemark/merge"
 *
 * const west = await readGeoJSONFile("./extracts/west.geojson")
 * const east = await readGeoJSONFile("./extracts/east.geojson")
 * const { collection, rejected } = mergeExtracts([west, east])
 * await writeGeoJSONFile("./out/merged.geojson", collection)
 * await writeGeoJSONFile("./out/rejected.geojson", rejected)
 * ```
 *
 * @module
 */

export * from "./chain"
export * from "./dedupe"
export * from "./filters"
export * from "./geofence"
export * from "./grid"
export * from "./merge"
export * from "./prune"
export * from "./types"
export * from "./utils"
