/**
 * Interchange file reading and writing.
 * @module
 */

import { mkdir, readFile, writeFile } from "node:fs/promises"
import { basename, dirname } from "node:path"
import type { Graph } from "@tidemark/core"
import { IOError } from "@tidemark/shared/errors"
import { consoleLogger, type Logger } from "@tidemark/shared/log"
import { graphFromGeoJSON, graphFromGeoJSONFast } from "./graph-from-geojson"
import { graphToGeoJSON } from "./graph-to-geojson"
import type { InterchangeCollection, ReadOptions, WriteOptions } from "./types"
import { parseFeatureCollection } from "./utils"

/**
 * Read and validate an interchange file.
 * @throws IOError when the file is missing, unreadable, not JSON or not an interchange FeatureCollection.
 */
export async function readGeoJSONFile(path: string): Promise<InterchangeCollection> {
	let text: string
	try {
		text = await readFile(path, "utf-8")
	} catch (error) {
		throw new IOError(`Cannot read ${path}`, path, { cause: error })
	}
	return parseFeatureCollection(text, path)
}

/**
 * Write a collection as 2-space indented UTF-8 JSON, creating parent directories.
 * @throws IOError when the file cannot be written.
 */
export async function writeGeoJSONFile(
	path: string,
	collection: InterchangeCollection,
	options: { logger?: Logger } = {},
) {
	const log = options.logger ?? consoleLogger
	try {
		await mkdir(dirname(path), { recursive: true })
		await writeFile(path, `${JSON.stringify(collection, null, 2)}\n`, "utf-8")
	} catch (error) {
		throw new IOError(`Cannot write ${path}`, path, { cause: error })
	}
	log(`Wrote ${collection.features.length} features to ${path}`, "info")
}

export interface ReadGraphOptions extends ReadOptions {
	/** Keep only geometry handles, without points. */
	fast: boolean
}

/**
 * Read an interchange file into a graph. The graph id defaults to the file name.
 */
export async function readGraphFile(
	path: string,
	options: Partial<ReadGraphOptions> = {},
): Promise<Graph> {
	const collection = await readGeoJSONFile(path)
	const readOptions = { ...options, id: options.id ?? basename(path) }
	return options.fast
		? graphFromGeoJSONFast(collection, readOptions)
		: graphFromGeoJSON(collection, readOptions)
}

/**
 * Write a graph to an interchange file.
 */
export async function writeGraphFile(
	path: string,
	graph: Graph,
	options: Partial<WriteOptions> = {},
) {
	await writeGeoJSONFile(path, graphToGeoJSON(graph, options), options)
}
