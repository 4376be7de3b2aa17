import { Plan, type ActionNode } from "../../src/plan/model.js";

/** Builds an action node with an empty description. */
export function action(id: string, kind = "noop", params: Record<string, string> = {}): ActionNode {
  return { id, kind, params, description: "" };
}

/** Plan over plain nodes; edges are `[source, target]` pairs. */
export function planOf(ids: readonly string[], edges: ReadonlyArray<readonly [string, string]> = [], goal = "test goal"): Plan {
  return new Plan({
    goal,
    nodes: ids.map((id) => action(id)),
    edges: edges.map(([source, target]) => ({ source, target })),
  });
}
