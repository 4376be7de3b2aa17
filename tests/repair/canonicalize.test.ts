import { describe, it } from "mocha";
import { expect } from "chai";

import { Plan } from "../../src/plan/model.js";
import { canonicalizePlan } from "../../src/repair/canonicalize.js";
import { VIRTUAL_END, VIRTUAL_START, repairPlan } from "../../src/repair/repair.js";
import { planOf } from "../helpers/plans.js";

describe("plan canonicalisation", () => {
  it("renumbers actions in topological order and keeps a trace of the old id", () => {
    const plan = new Plan({
      goal: "tidy",
      nodes: [
        { id: "stack_ab", kind: "stack", params: { block: "a", target: "b" }, description: "Stack a on b" },
        { id: "grab_a", kind: "pick-up", params: { block: "a" }, description: "" },
      ],
      edges: [
        { source: "grab_a", target: "stack_ab" },
        { source: "grab_a", target: "stack_ab" },
      ],
    });

    const outcome = canonicalizePlan(plan);

    expect(Object.fromEntries(outcome.idMap)).to.deep.equal({ grab_a: "action_1", stack_ab: "action_2" });
    expect(outcome.droppedArcs).to.equal(1);
    expect(plan.toJSON()).to.deep.equal({
      goal: "tidy",
      nodes: [
        { id: "action_1", kind: "pick-up", params: { block: "a" }, description: "[was: grab_a]" },
        { id: "action_2", kind: "stack", params: { block: "a", target: "b" }, description: "Stack a on b [was: stack_ab]" },
      ],
      edges: [{ source: "action_1", target: "action_2" }],
    });
  });

  it("keeps virtual node identifiers", () => {
    const plan = planOf(["print", "email"]);
    repairPlan(plan);
    const outcome = canonicalizePlan(plan);

    expect(plan.nodes.map((node) => node.id)).to.deep.equal([VIRTUAL_START, "action_1", "action_2", VIRTUAL_END]);
    expect(outcome.idMap.has(VIRTUAL_START)).to.equal(false);
    expect(plan.hasEdge(VIRTUAL_START, "action_1")).to.equal(true);
    expect(plan.hasEdge("action_2", VIRTUAL_END)).to.equal(true);
  });

  it("does not append a trace when the id is already canonical", () => {
    const plan = new Plan({ goal: "", nodes: [{ id: "action_1", kind: "noop", params: {}, description: "done" }] });
    canonicalizePlan(plan);
    expect(plan.nodes[0].description).to.equal("done");
  });
});
