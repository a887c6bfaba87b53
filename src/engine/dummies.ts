import type { WorkEdge } from "./graph.js";
import type { AcyclicGraph, DirectedEdge } from "./cycles.js";
import type { Layering } from "./layers.js";
import { LABEL_GAP } from "./defaults.js";
import { LayoutInvariantError } from "./errors.js";

export interface LayeredNode {
  index: number;
  id: string;
  width: number;
  height: number;
  layer: number;
  dummy: boolean;
  edge?: number;
  carriesLabel?: boolean;
}

export interface LayeredEdge extends DirectedEdge {
  chain: number[];
  labelNode?: number;
}

export interface Segment {
  from: number;
  to: number;
  edge: number;
}

export interface LayeredGraph {
  nodes: LayeredNode[];
  edges: LayeredEdge[];
  selfLoops: WorkEdge[];
  segments: Segment[];
  layers: number[][];
  realNodeCount: number;
  dummyCount: number;
}

// Label carriers attach at their left edge, with the label box to the right of the path.
export function anchorOffset(node: LayeredNode): number {
  return node.carriesLabel ? 0 : node.width / 2;
}

export function insertDummies(graph: AcyclicGraph, layering: Layering): LayeredGraph {
  const nodes: LayeredNode[] = graph.nodes.map((node) => ({
    index: node.index,
    id: node.id,
    width: node.width,
    height: node.height,
    layer: layering.layers[node.index],
    dummy: false,
  }));
  const segments: Segment[] = [];
  const edges: LayeredEdge[] = [];

  for (const edge of graph.edges) {
    const fromLayer = nodes[edge.from].layer;
    const toLayer = nodes[edge.to].layer;
    const chain = [edge.from];
    const layered: LayeredEdge = { ...edge, chain };

    // The middle dummy of a labelled edge reserves the label's box to the right of the path.
    const labelLayer = edge.label && toLayer - fromLayer > 1 ? fromLayer + Math.floor((toLayer - fromLayer) / 2) : -1;

    for (let layer = fromLayer + 1; layer < toLayer; layer += 1) {
      const index = nodes.length;
      const dummy: LayeredNode = {
        index,
        id: `${edge.id}~${layer}`,
        width: 0,
        height: 0,
        layer,
        dummy: true,
        edge: edge.index,
      };
      if (layer === labelLayer && edge.label) {
        dummy.width = edge.label.width + LABEL_GAP;
        dummy.height = edge.label.height;
        dummy.carriesLabel = true;
        layered.labelNode = index;
      }
      nodes.push(dummy);
      chain.push(index);
    }
    chain.push(edge.to);

    for (let i = 0; i < chain.length - 1; i += 1) {
      const from = chain[i];
      const to = chain[i + 1];
      if (nodes[to].layer !== nodes[from].layer + 1) {
        throw new LayoutInvariantError(`Edge ${edge.id} has a segment spanning layers ${nodes[from].layer} to ${nodes[to].layer}`);
      }
      segments.push({ from, to, edge: edge.index });
    }

    edges.push(layered);
  }

  const layers: number[][] = Array.from({ length: layering.layerCount }, () => []);
  for (const node of nodes) {
    layers[node.layer].push(node.index);
  }

  return {
    nodes,
    edges,
    selfLoops: graph.selfLoops,
    segments,
    layers,
    realNodeCount: graph.nodes.length,
    dummyCount: nodes.length - graph.nodes.length,
  };
}
