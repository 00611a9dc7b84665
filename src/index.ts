export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./graph/model.js";
export * from "./graph/descriptor.js";
export * from "./paths/types.js";
export * from "./paths/dijkstra.js";
export * from "./paths/bellmanFord.js";
export * from "./paths/floydWarshall.js";
export * from "./paths/reconstruct.js";
export * from "./report/text.js";
export * from "./config/env.js";
export * from "./config/runtime.js";
