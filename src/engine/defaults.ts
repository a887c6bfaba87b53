import type { LayoutConfig, LayoutResult } from "../types.js";

export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = Object.freeze({
  layerSpacing: 60,
  nodeSpacing: 40,
  edgeSpacing: 12,
  maxNodes: 2000,
  maxEdges: 4000,
  crossingIterations: 24,
  alignmentPasses: 4,
  routingStyle: "orthogonal",
  direction: "TB",
  margin: 20,
});

export const SELF_LOOP_EXTENT = 24;

export const LABEL_GAP = 4;

export function emptyResult(config: Readonly<LayoutConfig>): LayoutResult {
  return {
    nodes: [],
    edges: [],
    bounds: {
      width: config.margin * 2,
      height: config.margin * 2,
    },
    stats: {
      layerCount: 0,
      dummyCount: 0,
      reversedEdges: 0,
      selfLoops: 0,
      initialCrossings: 0,
      crossings: 0,
      sweeps: 0,
    },
  };
}
