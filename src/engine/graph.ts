import type { LayoutConfig, LayoutDirection, LayoutGraph, Size } from "../types.js";
import { ResourceLimitExceededError, ValidationError } from "./errors.js";
import { isTransposed } from "./geometry.js";

export interface WorkNode {
  index: number;
  id: string;
  width: number;
  height: number;
}

export interface WorkEdge {
  index: number;
  id: string;
  source: number;
  target: number;
  label?: Size;
}

export interface WorkGraph {
  nodes: WorkNode[];
  edges: WorkEdge[];
}

function isUsableLength(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function orientSize(size: Size, direction: LayoutDirection): Size {
  return isTransposed(direction) ? { width: size.height, height: size.width } : { width: size.width, height: size.height };
}

export function checkResourceLimits(graph: LayoutGraph, config: Readonly<LayoutConfig>): void {
  if (graph.nodes.length > config.maxNodes) {
    throw new ResourceLimitExceededError("maxNodes", graph.nodes.length, config.maxNodes);
  }
  if (graph.edges.length > config.maxEdges) {
    throw new ResourceLimitExceededError("maxEdges", graph.edges.length, config.maxEdges);
  }
}

// Unnamed edges become `e<index>`, suffixed when the caller already uses that id.
function defaultEdgeId(index: number, used: Set<string>): string {
  let id = `e${index}`;
  for (let suffix = 1; used.has(id); suffix += 1) {
    id = `e${index}_${suffix}`;
  }
  used.add(id);
  return id;
}

export function buildWorkGraph(graph: LayoutGraph, direction: LayoutDirection): WorkGraph {
  const nodes: WorkNode[] = [];
  const indexById = new Map<string, number>();

  graph.nodes.forEach((node, index) => {
    if (typeof node.id !== "string" || node.id.length === 0) {
      throw new ValidationError(`Node at position ${index} has no id`);
    }
    if (indexById.has(node.id)) {
      throw new ValidationError(`Duplicate node id: ${node.id}`);
    }
    if (!isUsableLength(node.width) || !isUsableLength(node.height)) {
      throw new ValidationError(`Node ${node.id} has an invalid size`);
    }
    indexById.set(node.id, index);
    nodes.push({ index, id: node.id, ...orientSize(node, direction) });
  });

  const edges: WorkEdge[] = [];
  const edgeIds = new Set<string>();
  for (const edge of graph.edges) {
    if (edge.id === undefined) {
      continue;
    }
    if (edgeIds.has(edge.id)) {
      throw new ValidationError(`Duplicate edge id: ${edge.id}`);
    }
    edgeIds.add(edge.id);
  }

  graph.edges.forEach((edge, index) => {
    const id = edge.id ?? defaultEdgeId(index, edgeIds);

    const source = indexById.get(edge.source);
    if (source === undefined) {
      throw new ValidationError(`Edge ${id} references undeclared source node: ${edge.source}`);
    }
    const target = indexById.get(edge.target);
    if (target === undefined) {
      throw new ValidationError(`Edge ${id} references undeclared target node: ${edge.target}`);
    }

    const workEdge: WorkEdge = { index, id, source, target };
    if (edge.label) {
      if (!isUsableLength(edge.label.width) || !isUsableLength(edge.label.height)) {
        throw new ValidationError(`Edge ${id} has an invalid label size`);
      }
      workEdge.label = orientSize(edge.label, direction);
    }
    edges.push(workEdge);
  });

  return { nodes, edges };
}
