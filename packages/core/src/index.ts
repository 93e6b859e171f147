export * from "./entities"
export * from "./graph"
export * from "./lines"
export * from "./points"
export * from "./polygons"
export * from "./tags"
