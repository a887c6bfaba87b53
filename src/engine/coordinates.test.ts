import { describe, expect, it } from "vitest";
import type { LayoutGraph } from "../types.js";
import { assignCoordinates, selfLoopRoom, type Placement } from "./coordinates.js";
import { DEFAULT_LAYOUT_CONFIG } from "./defaults.js";
import type { LayeredGraph } from "./dummies.js";
import { minimizeCrossings } from "./ordering.js";
import { indexOf, makeGraph, prepare, pseudoRandomGraph } from "./test-helper.js";

function place(graph: LayoutGraph): { layered: LayeredGraph; placement: Placement } {
  const layered = prepare(graph);
  const ordering = minimizeCrossings(layered, DEFAULT_LAYOUT_CONFIG);
  return { layered, placement: assignCoordinates(layered, ordering, DEFAULT_LAYOUT_CONFIG) };
}

describe("assignCoordinates", () => {
  it("stacks layers by their tallest node and centres nodes in the band", () => {
    const { layered, placement } = place({
      nodes: [
        { id: "A", width: 40, height: 20 },
        { id: "B", width: 40, height: 40 },
        { id: "C", width: 40, height: 30 },
      ],
      edges: [
        { source: "A", target: "B" },
        { source: "A", target: "C" },
      ],
    });

    expect(placement.layerTop).toEqual([20, 100]);
    expect(placement.layerBottom).toEqual([40, 140]);
    expect(placement.y[indexOf(layered, "B")]).toBe(100);
    expect(placement.y[indexOf(layered, "C")]).toBe(105);
  });

  it("lines a straight chain up on one vertical", () => {
    const { placement } = place(
      makeGraph(
        ["A", "B", "C"],
        [
          ["A", "B"],
          ["B", "C"],
        ],
      ),
    );

    expect(placement.x).toEqual([20, 20, 20]);
  });

  it("centres a child under the median of its two parents", () => {
    const { placement } = place(
      makeGraph(
        ["A", "B", "C"],
        [
          ["A", "C"],
          ["B", "C"],
        ],
      ),
    );

    expect(placement.x).toEqual([20, 100, 60]);
  });

  it("spreads siblings symmetrically under their parent", () => {
    const { placement } = place(
      makeGraph(
        ["A", "B", "C"],
        [
          ["A", "B"],
          ["A", "C"],
        ],
      ),
    );

    expect(placement.x).toEqual([60, 20, 100]);
  });

  it("reserves room beside a node for its self-loop", () => {
    const { layered, placement } = place(makeGraph(["A", "B"], [["A", "A"]]));

    expect(placement.loopRoom).toEqual([24, 0]);
    expect(placement.x).toEqual([20, 124]);
    expect(selfLoopRoom(layered, 12)).toEqual([24, 0]);
  });

  it("nests extra self-loops and makes room for their labels", () => {
    const layered = prepare({
      nodes: [{ id: "A", width: 40, height: 20 }],
      edges: [
        { source: "A", target: "A" },
        { source: "A", target: "A", label: { width: 20, height: 10 } },
      ],
    });

    expect(selfLoopRoom(layered, 12)).toEqual([24 + 12 + 4 + 20]);
  });

  it("keeps the configured spacing between neighbours on every layer", () => {
    for (let seed = 1; seed <= 15; seed += 1) {
      const layered = prepare(pseudoRandomGraph(seed, 12, 20));
      const ordering = minimizeCrossings(layered, DEFAULT_LAYOUT_CONFIG);
      const placement = assignCoordinates(layered, ordering, DEFAULT_LAYOUT_CONFIG);

      for (const layer of ordering.layers) {
        for (let i = 1; i < layer.length; i += 1) {
          const left = layer[i - 1];
          const right = placement.x[left] + layered.nodes[left].width + placement.loopRoom[left];
          expect(placement.x[layer[i]] - right).toBeGreaterThanOrEqual(40 - 1e-6);
        }
      }
      expect(Math.min(...placement.x)).toBeCloseTo(20, 9);
    }
  });
});
