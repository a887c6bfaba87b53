import type { EdgePath, LayoutConfig, LayoutGraph, LayoutResult, NodeBox, Point } from "../types.js";
import { createLogger, type LayoutLogger } from "../logger.js";
import { resolveLayoutConfig } from "./config.js";
import { assignCoordinates, type Placement } from "./coordinates.js";
import { breakCycles } from "./cycles.js";
import { emptyResult } from "./defaults.js";
import { insertDummies, type LayeredGraph } from "./dummies.js";
import {
  emptyExtent,
  includeBox,
  includePoint,
  orientBox,
  orientFrame,
  orientPoint,
  type Box,
} from "./geometry.js";
import { buildWorkGraph, checkResourceLimits, type WorkGraph } from "./graph.js";
import { assignLayers } from "./layers.js";
import { minimizeCrossings, type Ordering } from "./ordering.js";
import { routeEdges, type RoutedEdge } from "./routing.js";

export interface LayoutOptions {
  logger?: LayoutLogger;
}

const defaultLogger = createLogger("layered-layout", "error");

function buildResult(
  work: WorkGraph,
  layered: LayeredGraph,
  ordering: Ordering,
  placement: Placement,
  routes: RoutedEdge[],
  config: Readonly<LayoutConfig>,
  reversedCount: number,
): LayoutResult {
  const boxes: Box[] = [];
  for (let index = 0; index < layered.realNodeCount; index += 1) {
    const node = layered.nodes[index];
    boxes.push({ x: placement.x[index], y: placement.y[index], width: node.width, height: node.height });
  }

  const extent = emptyExtent();
  boxes.forEach((box, index) => {
    includeBox(extent, { ...box, width: box.width + placement.loopRoom[index] });
  });
  for (const route of routes) {
    route.points.forEach((point) => includePoint(extent, point));
    // Working-frame label size: already swapped for LR and RL.
    const label = work.edges[route.index].label;
    if (route.labelPosition && label) {
      includeBox(extent, {
        x: route.labelPosition.x - label.width / 2,
        y: route.labelPosition.y - label.height / 2,
        width: label.width,
        height: label.height,
      });
    }
  }

  // Normalise so the drawing, labels and loops included, starts at the margin.
  const dx = config.margin - extent.minX;
  const dy = config.margin - extent.minY;
  const frame = {
    width: extent.maxX - extent.minX + config.margin * 2,
    height: extent.maxY - extent.minY + config.margin * 2,
  };
  const place = (point: Point): Point => orientPoint({ x: point.x + dx, y: point.y + dy }, config.direction, frame);

  const nodes: NodeBox[] = boxes.map((box, index) => {
    const oriented = orientBox({ ...box, x: box.x + dx, y: box.y + dy }, config.direction, frame);
    return {
      id: layered.nodes[index].id,
      ...oriented,
      layer: layered.nodes[index].layer,
      order: ordering.position[index],
    };
  });

  const reversedByIndex = new Map(layered.edges.map((edge) => [edge.index, edge.reversed]));
  const edges: EdgePath[] = routes.map((route) => {
    const input = work.edges[route.index];
    const path: EdgePath = {
      id: input.id,
      source: work.nodes[input.source].id,
      target: work.nodes[input.target].id,
      points: route.points.map(place),
      reversed: reversedByIndex.get(route.index) ?? false,
      selfLoop: input.source === input.target,
      ...(route.labelPosition ? { labelPosition: place(route.labelPosition) } : {}),
    };
    return path;
  });

  return {
    nodes,
    edges,
    bounds: orientFrame(frame, config.direction),
    stats: {
      layerCount: ordering.layers.length,
      dummyCount: layered.dummyCount,
      reversedEdges: reversedCount,
      selfLoops: layered.selfLoops.length,
      initialCrossings: ordering.initialCrossings,
      crossings: ordering.crossings,
      sweeps: ordering.sweeps,
    },
  };
}

export function layoutGraph(
  graph: LayoutGraph,
  overrides: Partial<LayoutConfig> = {},
  options: LayoutOptions = {},
): LayoutResult {
  const logger = options.logger ?? defaultLogger;
  const config = resolveLayoutConfig(overrides);

  checkResourceLimits(graph, config);
  const work = buildWorkGraph(graph, config.direction);
  if (work.nodes.length === 0) {
    return emptyResult(config);
  }

  const acyclic = breakCycles(work);
  logger.debug("cycles broken", { stage: "cycles", count: acyclic.reversedCount, selfLoops: acyclic.selfLoops.length });

  const layering = assignLayers(acyclic);
  const layered = insertDummies(acyclic, layering);
  logger.debug("layers assigned", { stage: "layers", count: layering.layerCount, dummies: layered.dummyCount });

  const ordering = minimizeCrossings(layered, config);
  logger.debug("crossings minimised", {
    stage: "ordering",
    count: ordering.crossings,
    initial: ordering.initialCrossings,
    sweeps: ordering.sweeps,
  });

  const placement = assignCoordinates(layered, ordering, config);
  const routes = routeEdges(layered, placement, config);
  logger.debug("edges routed", { stage: "routing", count: routes.length, style: config.routingStyle });

  return buildResult(work, layered, ordering, placement, routes, config, acyclic.reversedCount);
}
