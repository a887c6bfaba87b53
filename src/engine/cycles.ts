import type { WorkEdge, WorkGraph, WorkNode } from "./graph.js";

export interface DirectedEdge extends WorkEdge {
  from: number;
  to: number;
  reversed: boolean;
}

export interface AcyclicGraph {
  nodes: WorkNode[];
  edges: DirectedEdge[];
  selfLoops: WorkEdge[];
  reversedCount: number;
}

const UNVISITED = 0;
const ON_STACK = 1;
const DONE = 2;

function compareIds(a: WorkNode, b: WorkNode): number {
  if (a.id < b.id) {
    return -1;
  }
  return a.id > b.id ? 1 : 0;
}

// Roots in ascending id, outgoing edges in input order: identical graphs reverse the same set.
export function breakCycles(graph: WorkGraph): AcyclicGraph {
  const selfLoops: WorkEdge[] = [];
  const outgoing: WorkEdge[][] = graph.nodes.map(() => []);

  for (const edge of graph.edges) {
    if (edge.source === edge.target) {
      selfLoops.push(edge);
      continue;
    }
    outgoing[edge.source].push(edge);
  }

  const state = new Array<number>(graph.nodes.length).fill(UNVISITED);
  const backEdges = new Set<number>();
  const roots = [...graph.nodes].sort(compareIds);

  for (const root of roots) {
    if (state[root.index] !== UNVISITED) {
      continue;
    }

    // Frames hold the node and the index of its next unexplored outgoing edge.
    const stack: Array<{ node: number; next: number }> = [{ node: root.index, next: 0 }];
    state[root.index] = ON_STACK;

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const edges = outgoing[frame.node];

      if (frame.next >= edges.length) {
        state[frame.node] = DONE;
        stack.pop();
        continue;
      }

      const edge = edges[frame.next];
      frame.next += 1;

      if (state[edge.target] === ON_STACK) {
        backEdges.add(edge.index);
      } else if (state[edge.target] === UNVISITED) {
        state[edge.target] = ON_STACK;
        stack.push({ node: edge.target, next: 0 });
      }
    }
  }

  const edges: DirectedEdge[] = [];
  for (const edge of graph.edges) {
    if (edge.source === edge.target) {
      continue;
    }
    const reversed = backEdges.has(edge.index);
    edges.push({
      ...edge,
      from: reversed ? edge.target : edge.source,
      to: reversed ? edge.source : edge.target,
      reversed,
    });
  }

  return {
    nodes: graph.nodes,
    edges,
    selfLoops,
    reversedCount: backEdges.size,
  };
}
