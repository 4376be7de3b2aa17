import { describe, it } from "mocha";
import { expect } from "chai";

import { validatePlan } from "../../src/sim/blocksworld.js";
import { parseBlocksworldProblem } from "../../src/sim/pddlProblem.js";

const PROBLEM = `
(define (problem BW-three)
  (:domain blocksworld)
  (:objects A B C - block)
  (:init
    (handempty)
    (ontable b)
    (ontable C)
    (on A B)
    (clear a)
    (clear c))
  (:goal (and (on c a))))
`;

describe("PDDL problem reader", () => {
  it("extracts names, objects and the initial state", () => {
    const summary = parseBlocksworldProblem(PROBLEM);
    expect(summary.problem).to.equal("bw-three");
    expect(summary.domain).to.equal("blocksworld");
    expect(summary.objects).to.deep.equal(["a", "b", "c"]);
    expect(summary.init).to.deep.equal(["handempty", "ontable b", "ontable c", "on a b", "clear a", "clear c"]);
    expect(summary.initialState).to.deep.equal({
      on_table: ["b", "c"],
      on: [["a", "b"]],
      clear: ["a", "c"],
      holding: null,
    });
  });

  it("feeds the simulator directly", () => {
    const { initialState } = parseBlocksworldProblem(PROBLEM);
    const report = validatePlan(["(pick-up c)", "(stack c a)"], initialState);
    expect(report.valid).to.equal(true);
  });

  it("keeps hyphenated object names and records a held block", () => {
    const summary = parseBlocksworldProblem(
      "(define (problem p1) (:domain bw) (:objects red-block blue-block) (:init (holding red-block) (ontable blue-block) (clear blue-block)))",
    );
    expect(summary.objects).to.deep.equal(["red-block", "blue-block"]);
    expect(summary.initialState.holding).to.equal("red-block");
  });

  it("tolerates missing sections", () => {
    const summary = parseBlocksworldProblem("(define (problem empty))");
    expect(summary.domain).to.equal(null);
    expect(summary.objects).to.deep.equal([]);
    expect(summary.initialState).to.deep.equal({ on_table: [], on: [], clear: [], holding: null });
  });
});
