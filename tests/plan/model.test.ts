import { describe, it } from "mocha";
import { expect } from "chai";

import { MalformedPlanError } from "../../src/errors.js";
import { Plan, parsePlan } from "../../src/plan/model.js";
import { ERROR_CODES } from "../../src/types.js";
import { action, planOf } from "../helpers/plans.js";

describe("plan model", () => {
  it("rejects duplicated node identifiers at construction", () => {
    let caught: unknown;
    try {
      planOf(["a", "b", "a"]);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(MalformedPlanError);
    if (caught instanceof MalformedPlanError) {
      expect(caught.code).to.equal(ERROR_CODES.PLAN_MALFORMED);
      expect(caught.issues).to.deep.equal([{ path: "/nodes/2", message: "duplicate node identifier 'a'" }]);
      expect(caught.message).to.equal("/nodes/2: duplicate node identifier 'a'");
    }
  });

  it("rejects empty node identifiers", () => {
    expect(() => new Plan({ goal: "g", nodes: [action("  ")] })).to.throw(
      MalformedPlanError,
      "/nodes/0: node id must not be empty",
    );
  });

  it("keeps nodes immutable and refuses to add a duplicate", () => {
    const plan = planOf(["a"]);
    expect(Object.isFrozen(plan.nodes[0])).to.equal(true);
    expect(() => plan.addNode(action("a"))).to.throw(MalformedPlanError);
    plan.addNode(action("b"));
    plan.addEdge({ source: "a", target: "b" });
    expect(plan.hasNode("b")).to.equal(true);
    expect(plan.hasEdge("a", "b")).to.equal(true);
    expect(plan.hasEdge("b", "a")).to.equal(false);
  });

  it("clones without sharing node or edge lists", () => {
    const plan = planOf(["a", "b"], [["a", "b"]]);
    const copy = plan.clone();
    copy.addNode(action("c"));
    expect(plan.nodes.map((node) => node.id)).to.deep.equal(["a", "b"]);
    expect(copy.nodes.map((node) => node.id)).to.deep.equal(["a", "b", "c"]);
  });

  describe("parsePlan", () => {
    it("accepts planner aliases and coerces scalar parameters", () => {
      const plan = parsePlan({
        goal_description: "Stack a on b",
        nodes: [
          { id: "s1", action_type: "PickUp", params: { block: "a", count: 1, careful: true } },
          { id: "s2", kind: "stack", action_type: "ignored", params: { block: "a", target: "b" }, description: "Stack a" },
        ],
        edges: [{ source: "s1", target: "s2", relation: "depends_on" }],
      });

      expect(plan.goal).to.equal("Stack a on b");
      expect(plan.toJSON()).to.deep.equal({
        goal: "Stack a on b",
        nodes: [
          { id: "s1", kind: "PickUp", params: { block: "a", count: "1", careful: "true" }, description: "" },
          { id: "s2", kind: "stack", params: { block: "a", target: "b" }, description: "Stack a" },
        ],
        edges: [{ source: "s1", target: "s2" }],
      });
    });

    it("reports schema problems with their location", () => {
      expect(() => parsePlan({ goal: "g", nodes: [{ id: "x" }] })).to.throw(
        MalformedPlanError,
        "/nodes/0/kind: node must declare an action kind",
      );
      expect(() => parsePlan({ goal: "g" })).to.throw(MalformedPlanError, "/nodes:");
    });

    it("reports duplicated ids found in a payload", () => {
      expect(() =>
        parsePlan({ nodes: [{ id: "a", kind: "noop" }, { id: "a", kind: "noop" }] }),
      ).to.throw(MalformedPlanError, "duplicate node identifier 'a'");
    });
  });
});
