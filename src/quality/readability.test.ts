import { describe, expect, it } from "vitest";
import type { EdgePath, LayoutResult, NodeBox } from "../types.js";
import { evaluateLayout } from "./readability.js";

function node(id: string, x: number, y: number, width = 10, height = 10): NodeBox {
  return { id, x, y, width, height, layer: 0, order: 0 };
}

function edge(id: string, source: string, target: string, points: Array<[number, number]>): EdgePath {
  return {
    id,
    source,
    target,
    points: points.map(([x, y]) => ({ x, y })),
    reversed: false,
    selfLoop: source === target,
  };
}

function result(nodes: NodeBox[], edges: EdgePath[]): LayoutResult {
  return {
    nodes,
    edges,
    bounds: { width: 200, height: 200 },
    stats: { layerCount: 1, dummyCount: 0, reversedEdges: 0, selfLoops: 0, initialCrossings: 0, crossings: 0, sweeps: 0 },
  };
}

describe("evaluateLayout", () => {
  it("counts a proper crossing between two edges", () => {
    const metrics = evaluateLayout(
      result(
        [],
        [
          edge("a", "p", "q", [
            [0, 0],
            [10, 10],
          ]),
          edge("b", "r", "s", [
            [0, 10],
            [10, 0],
          ]),
        ],
      ),
    );

    expect(metrics.edgeCrossings).toBe(1);
  });

  it("ignores edges that only meet at an endpoint", () => {
    const metrics = evaluateLayout(
      result(
        [],
        [
          edge("a", "p", "q", [
            [0, 0],
            [10, 10],
          ]),
          edge("b", "p", "r", [
            [10, 10],
            [20, 0],
          ]),
        ],
      ),
    );

    expect(metrics.edgeCrossings).toBe(0);
  });

  it("sums bends and lengths", () => {
    const metrics = evaluateLayout(
      result(
        [],
        [
          edge("a", "p", "q", [
            [0, 0],
            [0, 30],
            [40, 30],
            [40, 60],
          ]),
          edge("b", "p", "q", [
            [0, 0],
            [3, 4],
          ]),
        ],
      ),
    );

    expect(metrics.totalEdgeBends).toBe(2);
    expect(metrics.totalEdgeLength).toBe(105);
  });

  it("counts segments passing through foreign nodes", () => {
    const metrics = evaluateLayout(
      result(
        [node("p", 0, 0), node("q", 0, 100), node("blocker", 0, 50)],
        [
          edge("a", "p", "q", [
            [5, 10],
            [5, 100],
          ]),
        ],
      ),
    );

    expect(metrics.edgeThroughNodeCount).toBe(1);
  });

  it("does not count a segment grazing a node border", () => {
    const metrics = evaluateLayout(
      result(
        [node("p", 0, 0), node("q", 0, 100), node("beside", 10, 50)],
        [
          edge("a", "p", "q", [
            [10, 10],
            [10, 100],
          ]),
        ],
      ),
    );

    expect(metrics.edgeThroughNodeCount).toBe(0);
  });

  it("counts overlapping node pairs", () => {
    const metrics = evaluateLayout(result([node("a", 0, 0), node("b", 5, 5), node("c", 20, 0)], []));

    expect(metrics.nodeOverlapCount).toBe(1);
  });
});
