import type { LayoutConfig } from "../types.js";
import type { LayeredGraph, Segment } from "./dummies.js";

export interface Ordering {
  layers: number[][];
  position: number[];
  initialCrossings: number;
  crossings: number;
  sweeps: number;
}

interface Adjacency {
  up: number[][];
  down: number[][];
  segmentsByLayer: Segment[][];
}

function buildAdjacency(graph: LayeredGraph): Adjacency {
  const up: number[][] = graph.nodes.map(() => []);
  const down: number[][] = graph.nodes.map(() => []);
  const segmentsByLayer: Segment[][] = graph.layers.map(() => []);

  for (const segment of graph.segments) {
    down[segment.from].push(segment.to);
    up[segment.to].push(segment.from);
    segmentsByLayer[graph.nodes[segment.from].layer].push(segment);
  }

  return { up, down, segmentsByLayer };
}

function positionsOf(layers: number[][], size: number): number[] {
  const position = new Array<number>(size).fill(0);
  for (const layer of layers) {
    layer.forEach((node, index) => {
      position[node] = index;
    });
  }
  return position;
}

// Accumulator tree over the lower ends sorted by upper end (Barth, Jünger, Mutzel).
function countBilayerCrossings(segments: Segment[], position: number[], lowerSize: number): number {
  if (segments.length < 2 || lowerSize < 2) {
    return 0;
  }

  const lowerEnds = segments
    .map((segment) => ({ upper: position[segment.from], lower: position[segment.to] }))
    .sort((a, b) => a.upper - b.upper || a.lower - b.lower)
    .map((entry) => entry.lower);

  let firstIndex = 1;
  while (firstIndex < lowerSize) {
    firstIndex <<= 1;
  }
  const tree = new Array<number>(2 * firstIndex - 1).fill(0);
  firstIndex -= 1;

  let crossings = 0;
  for (const lower of lowerEnds) {
    let index = lower + firstIndex;
    tree[index] += 1;
    let weightSum = 0;
    while (index > 0) {
      if (index % 2 === 1) {
        weightSum += tree[index + 1];
      }
      index = (index - 1) >> 1;
      tree[index] += 1;
    }
    crossings += weightSum;
  }

  return crossings;
}

function countWithAdjacency(adjacency: Adjacency, layers: number[][], position: number[]): number {
  let total = 0;
  for (let layer = 0; layer < layers.length - 1; layer += 1) {
    total += countBilayerCrossings(adjacency.segmentsByLayer[layer], position, layers[layer + 1].length);
  }
  return total;
}

export function countCrossings(graph: LayeredGraph, layers: number[][]): number {
  return countWithAdjacency(buildAdjacency(graph), layers, positionsOf(layers, graph.nodes.length));
}

function reorderLayer(layer: number[], neighbours: number[][], position: number[]): void {
  const keyed = layer.map((node) => {
    const refs = neighbours[node];
    let barycenter = position[node];
    if (refs.length > 0) {
      let sum = 0;
      for (const ref of refs) {
        sum += position[ref];
      }
      barycenter = sum / refs.length;
    }
    return { node, barycenter, previous: position[node] };
  });

  keyed.sort((a, b) => a.barycenter - b.barycenter || a.previous - b.previous);

  keyed.forEach((entry, index) => {
    layer[index] = entry.node;
    position[entry.node] = index;
  });
}

export function minimizeCrossings(graph: LayeredGraph, config: Pick<LayoutConfig, "crossingIterations">): Ordering {
  const adjacency = buildAdjacency(graph);
  const layers = graph.layers.map((layer) => [...layer]);
  const position = positionsOf(layers, graph.nodes.length);

  const initialCrossings = countWithAdjacency(adjacency, layers, position);
  let best = layers.map((layer) => [...layer]);
  let bestCrossings = initialCrossings;
  let previous = initialCrossings;
  let sweeps = 0;

  while (sweeps < config.crossingIterations && bestCrossings > 0 && layers.length > 1) {
    const downward = sweeps % 2 === 0;
    if (downward) {
      for (let layer = 1; layer < layers.length; layer += 1) {
        reorderLayer(layers[layer], adjacency.up, position);
      }
    } else {
      for (let layer = layers.length - 2; layer >= 0; layer -= 1) {
        reorderLayer(layers[layer], adjacency.down, position);
      }
    }
    sweeps += 1;

    const crossings = countWithAdjacency(adjacency, layers, position);
    if (crossings < bestCrossings) {
      best = layers.map((layer) => [...layer]);
      bestCrossings = crossings;
    }
    if (crossings === previous) {
      break;
    }
    previous = crossings;
  }

  return {
    layers: best,
    position: positionsOf(best, graph.nodes.length),
    initialCrossings,
    crossings: bestCrossings,
    sweeps,
  };
}
