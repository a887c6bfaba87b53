import dagre from "dagre";
import type { AcyclicGraph } from "./cycles.js";
import { LayoutInvariantError } from "./errors.js";

export interface Layering {
  layers: number[];
  layerCount: number;
}

function topologicalOrder(graph: AcyclicGraph): number[] {
  const g = new dagre.graphlib.Graph({ directed: true });
  for (const node of graph.nodes) {
    g.setNode(String(node.index), {});
  }
  for (const edge of graph.edges) {
    g.setEdge(String(edge.from), String(edge.to));
  }

  try {
    return dagre.graphlib.alg.topsort(g).map(Number);
  } catch (error) {
    throw new LayoutInvariantError("Layer assignment found a cycle after cycle breaking", { cause: error });
  }
}

export function assignLayers(graph: AcyclicGraph): Layering {
  const outgoing: number[][] = graph.nodes.map(() => []);
  for (const edge of graph.edges) {
    outgoing[edge.from].push(edge.to);
  }

  const layers = new Array<number>(graph.nodes.length).fill(0);
  for (const node of topologicalOrder(graph)) {
    for (const next of outgoing[node]) {
      layers[next] = Math.max(layers[next], layers[node] + 1);
    }
  }

  const layerCount = graph.nodes.length === 0 ? 0 : layers.reduce((max, layer) => Math.max(max, layer), 0) + 1;
  if (layerCount > graph.nodes.length) {
    throw new LayoutInvariantError(`Layering produced ${layerCount} layers for ${graph.nodes.length} nodes`);
  }

  return { layers, layerCount };
}
