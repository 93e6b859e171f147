import type { Logger } from "@tidemark/shared/log"
import { Graph } from "./graph"

const HARBOR_LAT = 43.29
const HARBOR_LON = 5.36

const ONE_KM_LON = 0.0123 // approximately, at this latitude
const ONE_KM_LAT = 0.009

/**
 * Create a graph with:
 * - A coastline of two lines meeting at point 3
 * - A closed water polygon sharing points 1, 2 and 3 with the first line
 * - An isolated buoy point
 */
export function createMockGraph(logger?: Logger): Graph {
	const graph = new Graph({ id: "harbor", logger })
	graph.points.addPoint({ id: 1, lat: HARBOR_LAT, lon: HARBOR_LON })
	graph.points.addPoint({
		id: 2,
		lat: HARBOR_LAT,
		lon: HARBOR_LON + ONE_KM_LON, // 1km east
	})
	graph.points.addPoint({
		id: 3,
		lat: HARBOR_LAT + ONE_KM_LAT, // 1km north
		lon: HARBOR_LON + ONE_KM_LON,
	})
	graph.points.addPoint({
		id: 4,
		lat: HARBOR_LAT + ONE_KM_LAT,
		lon: HARBOR_LON,
	})
	graph.points.addPoint({
		id: 5,
		lat: HARBOR_LAT + 2 * ONE_KM_LAT, // 2km north
		lon: HARBOR_LON + 2 * ONE_KM_LON, // 2km east
	})
	graph.points.addPoint({
		id: 6,
		lat: HARBOR_LAT - ONE_KM_LAT / 2, // 500m south
		lon: HARBOR_LON + ONE_KM_LON / 2, // 500m east
		tags: { "seamark:type": "buoy_lateral" },
	})

	graph.lines.addLine({
		id: 10,
		refs: [1, 2, 3],
		tags: { natural: "coastline" },
	})
	graph.lines.addLine({
		id: 11,
		refs: [3, 5],
		tags: { natural: "coastline" },
	})
	graph.polygons.addPolygon({
		id: 20,
		outer: [1, 2, 3, 4, 1],
		tags: { natural: "water", name: "Harbor basin" },
	})
	return graph
}

export const MOCK_HARBOR = {
	lat: HARBOR_LAT,
	lon: HARBOR_LON,
	oneKmLat: ONE_KM_LAT,
	oneKmLon: ONE_KM_LON,
} as const
