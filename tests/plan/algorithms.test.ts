import { describe, it } from "mocha";
import { expect } from "chai";

import { weaklyConnectedComponents } from "../../src/plan/algorithms/components.js";
import { detectCycles } from "../../src/plan/algorithms/cycles.js";
import { topologicalOrder } from "../../src/plan/algorithms/topological.js";
import { buildGraph } from "../../src/plan/graph.js";
import { planOf } from "../helpers/plans.js";

describe("plan graph algorithms", () => {
  describe("detectCycles", () => {
    it("reports nothing for a DAG", () => {
      const result = detectCycles(buildGraph(planOf(["a", "b", "c"], [["a", "b"], ["a", "c"], ["b", "c"]])));
      expect(result).to.deep.equal({ hasCycle: false, cycles: [] });
    });

    it("reports a self-loop as a one-vertex cycle", () => {
      const result = detectCycles(buildGraph(planOf(["x", "y"], [["x", "x"], ["x", "y"]])));
      expect(result.cycles).to.deep.equal([["x"]]);
    });

    it("reports the stack suffix closing a longer cycle once", () => {
      const graph = buildGraph(planOf(["s", "a", "b", "c"], [["s", "a"], ["a", "b"], ["b", "c"], ["c", "a"], ["c", "a"]]));
      expect(detectCycles(graph).cycles).to.deep.equal([["a", "b", "c"]]);
    });

    it("stops at the configured limit", () => {
      const graph = buildGraph(planOf(["a", "b"], [["a", "a"], ["b", "b"]]));
      expect(detectCycles(graph, 1).cycles).to.deep.equal([["a"]]);
    });
  });

  describe("weaklyConnectedComponents", () => {
    it("groups vertices regardless of arc direction", () => {
      const graph = buildGraph(planOf(["a", "b", "c", "d", "e"], [["b", "a"], ["d", "c"], ["e", "c"]]));
      expect(weaklyConnectedComponents(graph)).to.deep.equal([
        ["a", "b"],
        ["c", "d", "e"],
      ]);
    });

    it("treats isolated vertices as their own components", () => {
      const graph = buildGraph(planOf(["print", "email"]));
      expect(weaklyConnectedComponents(graph)).to.deep.equal([["print"], ["email"]]);
    });
  });

  describe("topologicalOrder", () => {
    it("follows declaration order along a linear chain", () => {
      const graph = buildGraph(planOf(["a", "b", "c", "d"], [["a", "b"], ["b", "c"], ["c", "d"]]));
      expect(topologicalOrder(graph)).to.deep.equal(["a", "b", "c", "d"]);
    });

    it("breaks ties by declaration index", () => {
      const graph = buildGraph(planOf(["z", "y", "x", "w"], [["x", "w"], ["z", "w"]]));
      expect(topologicalOrder(graph)).to.deep.equal(["z", "y", "x", "w"]);
    });

    it("respects dependencies declared against declaration order", () => {
      const graph = buildGraph(planOf(["late", "early"], [["early", "late"]]));
      expect(topologicalOrder(graph)).to.deep.equal(["early", "late"]);
    });

    it("returns null when a cycle blocks the ordering", () => {
      const graph = buildGraph(planOf(["a", "b"], [["a", "b"], ["b", "a"]]));
      expect(topologicalOrder(graph)).to.equal(null);
    });
  });
});
