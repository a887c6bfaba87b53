export { layoutGraph } from "./engine/index.js";
export type { LayoutOptions } from "./engine/index.js";
export { resolveLayoutConfig, parseLayoutConfigYaml } from "./engine/config.js";
export { DEFAULT_LAYOUT_CONFIG } from "./engine/defaults.js";
export {
  LayoutError,
  LayoutInvariantError,
  ResourceLimitExceededError,
  ValidationError,
  isLayoutError,
} from "./engine/errors.js";
export type { LayoutErrorCode, ResourceLimit } from "./engine/errors.js";
export { breakCycles } from "./engine/cycles.js";
export { assignLayers } from "./engine/layers.js";
export { insertDummies } from "./engine/dummies.js";
export { countCrossings, minimizeCrossings } from "./engine/ordering.js";
export { assignCoordinates } from "./engine/coordinates.js";
export { routeEdges } from "./engine/routing.js";
export { buildWorkGraph } from "./engine/graph.js";
export { evaluateLayout } from "./quality/readability.js";
export type { LayoutMetrics } from "./quality/readability.js";
export { createLogger, createJsonLogger } from "./logger.js";
export type { LayoutLogger, LogMode } from "./logger.js";
export type * from "./types.js";
