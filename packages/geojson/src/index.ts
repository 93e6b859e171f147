/**
 * Convert between Tidemark graphs and the interchange format.
 *
 * - **Read**: `graphFromGeoJSON` rebuilds points, lines and polygons; `graphFromGeoJSONFast` keeps only geometries.
 * - **Write**: `graphToGeoJSON` emits lines, polygons and isolated points.
 * - **Files**: `readGeoJSONFile`, `writeGeoJSONFile`, `readGraphFile`, `writeGraphFile`.
 *
 * @example
 * ```ts
 * import { readGraphFile, writeGraphFile } from "@tidemark/geojson"
 *
 * const graph = await readGraphFile("./extracts/coast.geojson")
 * graph.points.removeIsolated()
 * await writeGraphFile("./out/coast.geojson", graph)
 * ```
 *
 * @module
 */

export * from "./graph-from-geojson"
export * from "./graph-to-geojson"
export * from "./io"
export * from "./schema"
export * from "./types"
export * from "./utils"
