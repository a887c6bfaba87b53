import type { LayoutConfig, Point } from "../types.js";
import type { Placement } from "./coordinates.js";
import { LABEL_GAP, SELF_LOOP_EXTENT } from "./defaults.js";
import { anchorOffset, type LayeredEdge, type LayeredGraph } from "./dummies.js";
import { midpointLabelPosition, simplifyPolyline } from "./geometry.js";
import type { WorkEdge } from "./graph.js";

export interface RoutedEdge {
  index: number;
  points: Point[];
  labelPosition?: Point;
}

type RoutingConfig = Pick<LayoutConfig, "routingStyle" | "edgeSpacing">;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// Edges sharing both processing endpoints spread symmetrically, `edgeSpacing` apart.
function laneOffsets(edges: LayeredEdge[], spacing: number): Map<number, number> {
  const groups = new Map<string, LayeredEdge[]>();
  for (const edge of edges) {
    const key = `${edge.from}>${edge.to}`;
    const group = groups.get(key) ?? [];
    group.push(edge);
    groups.set(key, group);
  }

  const offsets = new Map<number, number>();
  for (const group of groups.values()) {
    group.forEach((edge, lane) => {
      offsets.set(edge.index, (lane - (group.length - 1) / 2) * spacing);
    });
  }
  return offsets;
}

// Orthogonal runs turn mid-gap, moved by the lane shift so parallel lanes never cross.
function crossGap(points: Point[], to: Point, orthogonal: boolean, laneShift: number): void {
  const from = points[points.length - 1];
  if (!orthogonal || Math.abs(from.x - to.x) < 1e-9) {
    points.push(to);
    return;
  }

  const half = (to.y - from.y) / 2;
  const direction = to.x > from.x ? 1 : -1;
  const shift = clamp(laneShift * direction, -half / 2, half / 2);
  const bendY = from.y + half - shift;
  points.push({ x: from.x, y: bendY }, { x: to.x, y: bendY }, to);
}

function routeChain(edge: LayeredEdge, graph: LayeredGraph, placement: Placement, config: RoutingConfig, lane: number): RoutedEdge {
  const { x, y, layerTop, layerBottom } = placement;
  const nodes = graph.nodes;

  const portX = (node: number): number => {
    const half = nodes[node].width / 2;
    return x[node] + half + clamp(lane, -half, half);
  };

  const orthogonal = config.routingStyle === "orthogonal";
  const path: Point[] = [];
  const first = edge.chain[0];
  const startX = portX(first);
  path.push({ x: startX, y: y[first] + nodes[first].height });
  path.push({ x: startX, y: layerBottom[nodes[first].layer] });

  for (let i = 1; i < edge.chain.length; i += 1) {
    const node = edge.chain[i];
    const layer = nodes[node].layer;
    const last = i === edge.chain.length - 1;
    const px = last ? portX(node) : x[node] + anchorOffset(nodes[node]);

    crossGap(path, { x: px, y: layerTop[layer] }, orthogonal, lane);
    path.push({ x: px, y: last ? y[node] : layerBottom[layer] });
  }

  const points = simplifyPolyline(path);
  if (edge.reversed) {
    points.reverse();
  }

  const routed: RoutedEdge = { index: edge.index, points };
  if (edge.label) {
    if (edge.labelNode !== undefined) {
      const carrier = edge.labelNode;
      routed.labelPosition = {
        x: x[carrier] + LABEL_GAP + edge.label.width / 2,
        y: y[carrier] + nodes[carrier].height / 2,
      };
    } else {
      routed.labelPosition = midpointLabelPosition(points, edge.label, LABEL_GAP);
    }
  }
  return routed;
}

function routeSelfLoop(loop: WorkEdge, nesting: number, graph: LayeredGraph, placement: Placement, spacing: number): RoutedEdge {
  const node = graph.nodes[loop.source];
  const right = placement.x[node.index] + node.width;
  const cy = placement.y[node.index] + node.height / 2;
  const reach = right + SELF_LOOP_EXTENT + nesting * spacing;
  const spread = Math.min(node.height / 2, node.height / 4 + (nesting * spacing) / 2);

  const routed: RoutedEdge = {
    index: loop.index,
    points: [
      { x: right, y: cy - spread },
      { x: reach, y: cy - spread },
      { x: reach, y: cy + spread },
      { x: right, y: cy + spread },
    ],
  };
  if (loop.label) {
    routed.labelPosition = { x: reach + LABEL_GAP + loop.label.width / 2, y: cy };
  }
  return routed;
}

export function routeEdges(graph: LayeredGraph, placement: Placement, config: RoutingConfig): RoutedEdge[] {
  const lanes = laneOffsets(graph.edges, config.edgeSpacing);
  const routed: RoutedEdge[] = graph.edges.map((edge) => routeChain(edge, graph, placement, config, lanes.get(edge.index) ?? 0));

  const nesting = new Map<number, number>();
  for (const loop of graph.selfLoops) {
    const level = nesting.get(loop.source) ?? 0;
    nesting.set(loop.source, level + 1);
    routed.push(routeSelfLoop(loop, level, graph, placement, config.edgeSpacing));
  }

  return routed.sort((a, b) => a.index - b.index);
}
