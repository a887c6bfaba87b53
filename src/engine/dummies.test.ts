import { describe, expect, it } from "vitest";
import type { LayoutGraph } from "../types.js";
import { anchorOffset } from "./dummies.js";
import { makeGraph, prepare, pseudoRandomGraph } from "./test-helper.js";

const shortcut = makeGraph(
  ["A", "B", "C"],
  [
    ["A", "B"],
    ["B", "C"],
    ["A", "C"],
  ],
);

describe("insertDummies", () => {
  it("splits a long edge with one dummy per skipped layer", () => {
    const layered = prepare(shortcut);

    expect(layered.dummyCount).toBe(1);
    expect(layered.realNodeCount).toBe(3);
    expect(layered.nodes[3]).toEqual({ index: 3, id: "e2~1", width: 0, height: 0, layer: 1, dummy: true, edge: 2 });
    expect(layered.edges[2].chain).toEqual([0, 3, 2]);
    expect(layered.edges[0].chain).toEqual([0, 1]);
  });

  it("lists real nodes before dummies in the initial layers", () => {
    expect(prepare(shortcut).layers).toEqual([[0], [1, 3], [2]]);
  });

  it("emits unit-span segments only", () => {
    const layered = prepare(shortcut);

    expect(layered.segments).toEqual([
      { from: 0, to: 1, edge: 0 },
      { from: 1, to: 2, edge: 1 },
      { from: 0, to: 3, edge: 2 },
      { from: 3, to: 2, edge: 2 },
    ]);
    for (let seed = 1; seed <= 10; seed += 1) {
      const random = prepare(pseudoRandomGraph(seed, 10, 20));
      for (const segment of random.segments) {
        expect(random.nodes[segment.to].layer).toBe(random.nodes[segment.from].layer + 1);
      }
    }
  });

  it("chains a reversed edge in processing direction", () => {
    const layered = prepare(
      makeGraph(
        ["A", "B", "C"],
        [
          ["A", "B"],
          ["B", "C"],
          ["C", "A"],
        ],
      ),
    );

    expect(layered.edges[2].reversed).toBe(true);
    expect(layered.edges[2].chain).toEqual([0, 3, 2]);
  });

  it("gives the middle dummy of a labelled edge the label's size", () => {
    const graph: LayoutGraph = {
      nodes: shortcut.nodes,
      edges: [
        { source: "A", target: "B" },
        { source: "B", target: "C" },
        { source: "A", target: "C", label: { width: 30, height: 10 } },
      ],
    };
    const layered = prepare(graph);
    const carrier = layered.nodes[3];

    expect(layered.edges[2].labelNode).toBe(3);
    expect(carrier.width).toBe(34);
    expect(carrier.height).toBe(10);
    expect(carrier.carriesLabel).toBe(true);
    expect(anchorOffset(carrier)).toBe(0);
  });

  it("picks the carrier halfway down a longer edge", () => {
    const graph: LayoutGraph = {
      nodes: makeGraph(["A", "B", "C", "D", "E"], []).nodes,
      edges: [
        { source: "A", target: "B" },
        { source: "B", target: "C" },
        { source: "C", target: "D" },
        { source: "D", target: "E" },
        { source: "A", target: "E", label: { width: 12, height: 8 } },
      ],
    };
    const layered = prepare(graph);

    expect(layered.edges[4].chain).toEqual([0, 5, 6, 7, 4]);
    expect(layered.edges[4].labelNode).toBe(6);
    expect(layered.nodes[6].layer).toBe(2);
    expect(layered.nodes[5].carriesLabel).toBeUndefined();
  });

  it("adds no dummy for a labelled edge between adjacent layers", () => {
    const layered = prepare({
      nodes: makeGraph(["A", "B"], []).nodes,
      edges: [{ source: "A", target: "B", label: { width: 30, height: 10 } }],
    });

    expect(layered.dummyCount).toBe(0);
    expect(layered.edges[0].labelNode).toBeUndefined();
  });
});
