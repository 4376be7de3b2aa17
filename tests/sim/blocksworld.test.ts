import { describe, it } from "mocha";
import { expect } from "chai";

import { InvalidWorldStateError, PhysicsViolationError } from "../../src/errors.js";
import { ERROR_CODES } from "../../src/types.js";
import {
  WorldState,
  blocksworldSimulator,
  normaliseBlocksworldKind,
  parseBlocksworldInitialState,
  validatePlan,
  type BlocksworldInitialState,
} from "../../src/sim/blocksworld.js";

const TWO_ON_TABLE: BlocksworldInitialState = { on_table: ["a", "b"], clear: ["a", "b"], holding: null };
const A_ON_B: BlocksworldInitialState = { on: [["a", "b"]], clear: ["a"], holding: null };

describe("blocksworld simulator", () => {
  it("picks up a clear block from the table", () => {
    const report = validatePlan(["(pick-up a)"], TWO_ON_TABLE);
    expect(report.valid).to.equal(true);
    expect(report.errors).to.deep.equal([]);
    expect(report.appliedCount).to.equal(1);
    expect(report.finalState).to.deep.equal({ on_table: ["b"], on: [], clear: ["b"], holding: "a" });
  });

  it("stacks the held block onto a clear one", () => {
    const report = validatePlan(["(pick-up a)", "(stack a b)"], TWO_ON_TABLE);
    expect(report.valid).to.equal(true);
    expect(report.finalState).to.deep.equal({ on_table: ["b"], on: [["a", "b"]], clear: ["a"], holding: null });
  });

  it("halts at the first violated precondition", () => {
    const report = validatePlan(["(pick-up b)", "(put-down b)"], A_ON_B);
    expect(report.valid).to.equal(false);
    expect(report.failedIndex).to.equal(0);
    expect(report.appliedCount).to.equal(0);
    expect(report.errors).to.deep.equal(["step 0: (pick-up b) violates precondition: b is not clear"]);
    expect(report.code).to.equal(ERROR_CODES.PHYSICS_VIOLATION);
    expect(report.finalState).to.deep.equal({ on_table: [], on: [["a", "b"]], clear: ["a"], holding: null });
  });

  it("unstacks and puts down", () => {
    const report = validatePlan(["(unstack a b)", "(put-down a)", "(pick-up b)"], {
      on_table: ["b"],
      on: [["a", "b"]],
      clear: ["a"],
    });
    expect(report.valid).to.equal(true);
    expect(report.finalState).to.deep.equal({ on_table: ["a"], on: [], clear: ["a"], holding: "b" });
  });

  it("reports a busy hand", () => {
    const report = validatePlan(["(pick-up a)", "(pick-up b)"], TWO_ON_TABLE);
    expect(report.errors).to.deep.equal([
      "step 1: (pick-up b) violates precondition: hand is not empty (holding a)",
    ]);
    expect(report.failedIndex).to.equal(1);
    expect(report.appliedCount).to.equal(1);
  });

  it("reports unknown kinds, arity mismatches and unparsable text", () => {
    const unknown = validatePlan(["(fly a)"], TWO_ON_TABLE);
    expect(unknown.errors).to.deep.equal(["step 0: unknown action kind 'fly' in (fly a)"]);
    expect(unknown.code).to.equal(ERROR_CODES.PHYSICS_UNKNOWN_ACTION);

    const arity = validatePlan(["(stack a)"], TWO_ON_TABLE);
    expect(arity.errors).to.deep.equal(["step 0: (stack a) expects 2 argument(s), got 1"]);
    expect(arity.code).to.equal(ERROR_CODES.PHYSICS_PARSE);

    const garbled = validatePlan(["(pick-up a"], TWO_ON_TABLE);
    expect(garbled.errors).to.deep.equal([
      "step 0: cannot parse '(pick-up a': unbalanced parentheses in '(pick-up a'",
    ]);
    expect(garbled.code).to.equal(ERROR_CODES.PHYSICS_PARSE);
  });

  it("matches block names from the initial state regardless of case", () => {
    const report = validatePlan(["(pick-up A)", "(stack A B)"], {
      on_table: ["A", "B"],
      clear: ["A", "B"],
      holding: null,
    });
    expect(report.valid).to.equal(true);
    expect(report.code).to.equal(null);
    expect(report.finalState).to.deep.equal({ on_table: ["b"], on: [["a", "b"]], clear: ["a"], holding: null });
  });

  it("accepts spelling variants of the action kinds", () => {
    expect(normaliseBlocksworldKind("PickUp")).to.equal("pick-up");
    expect(normaliseBlocksworldKind("put_down")).to.equal("put-down");
    expect(normaliseBlocksworldKind("move")).to.equal(null);
    expect(validatePlan(["(pickup a)"], TWO_ON_TABLE).valid).to.equal(true);
  });

  it("is deterministic for the same sequence and state", () => {
    const actions = ["(pick-up a)", "(stack a b)", "(pick-up b)"];
    const first = validatePlan(actions, TWO_ON_TABLE);
    const second = validatePlan(actions, TWO_ON_TABLE);
    expect(second).to.deep.equal(first);
    expect(first.failedIndex).to.equal(2);
    expect(first.errors).to.deep.equal(["step 2: (pick-up b) violates precondition: b is not clear"]);
  });

  it("leaves the state untouched when a transition is rejected", () => {
    const state = WorldState.from(TWO_ON_TABLE);
    state.pickUp("a");
    expect(() => state.stack("b", "a")).to.throw(PhysicsViolationError, "hand is not holding b");
    expect(state.snapshot()).to.deep.equal({ on_table: ["b"], on: [], clear: ["b"], holding: "a" });
  });

  it("validates untrusted initial states", () => {
    expect(parseBlocksworldInitialState({ on_table: ["A"], clear: ["A"] })).to.deep.equal({
      on_table: ["a"],
      on: [],
      clear: ["a"],
      holding: null,
    });
    expect(() => parseBlocksworldInitialState({ table: ["a"] })).to.throw(InvalidWorldStateError, "invalid initial state");
    expect(() => blocksworldSimulator.simulate([], { on: [["a"]] })).to.throw(InvalidWorldStateError);
  });
});
