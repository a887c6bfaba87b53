import type { GraphEdge, LayoutDirection, LayoutGraph, NodeBox } from "../types.js";
import { breakCycles } from "./cycles.js";
import { insertDummies, type LayeredGraph } from "./dummies.js";
import { buildWorkGraph } from "./graph.js";
import { assignLayers } from "./layers.js";

export function makeGraph(
  ids: string[],
  edges: Array<[string, string]>,
  size: { width: number; height: number } = { width: 40, height: 20 },
): LayoutGraph {
  return {
    nodes: ids.map((id) => ({ id, width: size.width, height: size.height })),
    edges: edges.map(([source, target]): GraphEdge => ({ source, target })),
  };
}

export function prepare(graph: LayoutGraph, direction: LayoutDirection = "TB"): LayeredGraph {
  const acyclic = breakCycles(buildWorkGraph(graph, direction));
  return insertDummies(acyclic, assignLayers(acyclic));
}

export function indexOf(layered: LayeredGraph, id: string): number {
  const node = layered.nodes.find((candidate) => candidate.id === id);
  if (!node) {
    throw new Error(`No node ${id}`);
  }
  return node.index;
}

export function boxOf(nodes: readonly NodeBox[], id: string): NodeBox {
  const box = nodes.find((node) => node.id === id);
  if (!box) {
    throw new Error(`No box for ${id}`);
  }
  return box;
}

export function pseudoRandomGraph(seed: number, nodeCount: number, edgeCount: number): LayoutGraph {
  let state = seed >>> 0;
  const next = (bound: number): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % bound;
  };

  const nodes = Array.from({ length: nodeCount }, (_, i) => ({
    id: `n${i}`,
    width: 20 + next(5) * 10,
    height: 16 + next(3) * 8,
  }));
  const edges: GraphEdge[] = Array.from({ length: edgeCount }, () => ({
    source: `n${next(nodeCount)}`,
    target: `n${next(nodeCount)}`,
  }));

  return { nodes, edges };
}
