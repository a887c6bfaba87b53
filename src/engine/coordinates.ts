import type { LayoutConfig } from "../types.js";
import { LABEL_GAP, SELF_LOOP_EXTENT } from "./defaults.js";
import { anchorOffset, type LayeredGraph } from "./dummies.js";
import { LayoutInvariantError } from "./errors.js";
import type { Ordering } from "./ordering.js";

export interface Placement {
  x: number[];
  y: number[];
  layerTop: number[];
  layerBottom: number[];
  loopRoom: number[];
}

type PlacementConfig = Pick<LayoutConfig, "layerSpacing" | "nodeSpacing" | "edgeSpacing" | "alignmentPasses" | "margin">;

const OVERLAP_TOLERANCE = 1e-6;

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function selfLoopRoom(graph: LayeredGraph, edgeSpacing: number): number[] {
  const room = new Array<number>(graph.nodes.length).fill(0);
  const seen = new Array<number>(graph.nodes.length).fill(0);

  for (const loop of graph.selfLoops) {
    const nesting = seen[loop.source];
    seen[loop.source] += 1;
    const extent = SELF_LOOP_EXTENT + nesting * edgeSpacing;
    const labelRoom = loop.label ? LABEL_GAP + loop.label.width : 0;
    room[loop.source] = Math.max(room[loop.source], extent + labelRoom);
  }

  return room;
}

function verticalPlacement(graph: LayeredGraph, ordering: Ordering, config: PlacementConfig) {
  const layerTop: number[] = [];
  const layerBottom: number[] = [];
  const y = new Array<number>(graph.nodes.length).fill(0);

  let top = config.margin;
  for (const layer of ordering.layers) {
    const height = layer.reduce((max, node) => Math.max(max, graph.nodes[node].height), 0);
    layerTop.push(top);
    layerBottom.push(top + height);
    for (const node of layer) {
      y[node] = top + (height - graph.nodes[node].height) / 2;
    }
    top += height + config.layerSpacing;
  }

  return { y, layerTop, layerBottom };
}

// The averaged left-packed and right-packed passes both keep every gap at least `spacing`.
function resolveLayer(desired: number[], extents: number[], spacing: number): number[] {
  const count = desired.length;
  const fromLeft = new Array<number>(count).fill(0);
  const fromRight = new Array<number>(count).fill(0);

  for (let i = 0; i < count; i += 1) {
    fromLeft[i] = i === 0 ? desired[i] : Math.max(desired[i], fromLeft[i - 1] + extents[i - 1] + spacing);
  }
  for (let i = count - 1; i >= 0; i -= 1) {
    fromRight[i] = i === count - 1 ? desired[i] : Math.min(desired[i], fromRight[i + 1] - extents[i] - spacing);
  }

  return desired.map((_, i) => (fromLeft[i] + fromRight[i]) / 2);
}

export function assignCoordinates(graph: LayeredGraph, ordering: Ordering, config: PlacementConfig): Placement {
  const { y, layerTop, layerBottom } = verticalPlacement(graph, ordering, config);
  const loopRoom = selfLoopRoom(graph, config.edgeSpacing);
  const extent = graph.nodes.map((node) => node.width + loopRoom[node.index]);
  const x = new Array<number>(graph.nodes.length).fill(0);

  for (const layer of ordering.layers) {
    let cursor = 0;
    for (const node of layer) {
      x[node] = cursor;
      cursor += extent[node] + config.nodeSpacing;
    }
  }

  const up: number[][] = graph.nodes.map(() => []);
  const down: number[][] = graph.nodes.map(() => []);
  for (const segment of graph.segments) {
    down[segment.from].push(segment.to);
    up[segment.to].push(segment.from);
  }

  const anchor = (node: number): number => x[node] + anchorOffset(graph.nodes[node]);

  const align = (layer: number[], neighbours: number[][]): void => {
    const desired = layer.map((node) => {
      const refs = neighbours[node];
      const target = refs.length > 0 ? median(refs.map(anchor)) : anchor(node);
      return target - anchorOffset(graph.nodes[node]);
    });
    const placed = resolveLayer(
      desired,
      layer.map((node) => extent[node]),
      config.nodeSpacing,
    );
    layer.forEach((node, i) => {
      x[node] = placed[i];
    });
  };

  const layers = ordering.layers;
  for (let pass = 0; pass < config.alignmentPasses; pass += 1) {
    for (let layer = 1; layer < layers.length; layer += 1) {
      align(layers[layer], up);
    }
    for (let layer = layers.length - 2; layer >= 0; layer -= 1) {
      align(layers[layer], down);
    }
  }

  let minX = Infinity;
  for (const node of graph.nodes) {
    minX = Math.min(minX, x[node.index]);
  }
  const shift = Number.isFinite(minX) ? config.margin - minX : 0;
  for (let i = 0; i < x.length; i += 1) {
    x[i] += shift;
  }

  assertSeparated(layers, x, extent, config.nodeSpacing);

  return { x, y, layerTop, layerBottom, loopRoom };
}

function assertSeparated(layers: number[][], x: number[], extent: number[], spacing: number): void {
  for (const layer of layers) {
    for (let i = 1; i < layer.length; i += 1) {
      const left = layer[i - 1];
      const gap = x[layer[i]] - (x[left] + extent[left]);
      if (gap < spacing - OVERLAP_TOLERANCE) {
        throw new LayoutInvariantError(`Nodes ${left} and ${layer[i]} are ${gap} apart, below the ${spacing} minimum`);
      }
    }
  }
}
