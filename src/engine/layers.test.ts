import { describe, expect, it } from "vitest";
import type { AcyclicGraph } from "./cycles.js";
import { breakCycles } from "./cycles.js";
import { LayoutInvariantError } from "./errors.js";
import { buildWorkGraph } from "./graph.js";
import { assignLayers } from "./layers.js";
import { makeGraph } from "./test-helper.js";

function layersOf(ids: string[], edges: Array<[string, string]>): number[] {
  return assignLayers(breakCycles(buildWorkGraph(makeGraph(ids, edges), "TB"))).layers;
}

describe("assignLayers", () => {
  it("places a chain with a shortcut on three layers", () => {
    const layering = assignLayers(
      breakCycles(
        buildWorkGraph(
          makeGraph(
            ["A", "B", "C"],
            [
              ["A", "B"],
              ["B", "C"],
              ["A", "C"],
            ],
          ),
          "TB",
        ),
      ),
    );

    expect(layering.layers).toEqual([0, 1, 2]);
    expect(layering.layerCount).toBe(3);
  });

  it("puts every source on layer 0", () => {
    expect(
      layersOf(
        ["X", "Y", "Z"],
        [
          ["X", "Z"],
          ["Y", "Z"],
        ],
      ),
    ).toEqual([0, 0, 1]);
  });

  it("follows the longest path into a node", () => {
    expect(
      layersOf(
        ["A", "B", "C", "D"],
        [
          ["A", "B"],
          ["B", "C"],
          ["C", "D"],
          ["A", "D"],
        ],
      ),
    ).toEqual([0, 1, 2, 3]);
  });

  it("keeps isolated nodes on layer 0", () => {
    expect(layersOf(["A", "B", "lonely"], [["A", "B"]])).toEqual([0, 1, 0]);
  });

  it("has no layers for an empty graph", () => {
    expect(assignLayers({ nodes: [], edges: [], selfLoops: [], reversedCount: 0 })).toEqual({ layers: [], layerCount: 0 });
  });

  it("rejects a graph that still has a cycle", () => {
    const cyclic: AcyclicGraph = {
      nodes: [
        { index: 0, id: "a", width: 10, height: 10 },
        { index: 1, id: "b", width: 10, height: 10 },
      ],
      edges: [
        { index: 0, id: "e0", source: 0, target: 1, from: 0, to: 1, reversed: false },
        { index: 1, id: "e1", source: 1, target: 0, from: 1, to: 0, reversed: false },
      ],
      selfLoops: [],
      reversedCount: 0,
    };

    expect(() => assignLayers(cyclic)).toThrow(LayoutInvariantError);
  });
});
