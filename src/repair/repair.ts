import type { ActionNode, Plan } from "../plan/model.js";
import { buildGraph, type PlanGraph } from "../plan/graph.js";
import { weaklyConnectedComponents } from "../plan/algorithms/components.js";
import { detectCycles } from "../plan/algorithms/cycles.js";

/** Identifier of the synthetic node preceding every component. */
export const VIRTUAL_START = "__START__";
/** Identifier of the synthetic node following every component. */
export const VIRTUAL_END = "__END__";
/** Action kind carried by synthetic nodes. */
export const VIRTUAL_KIND = "virtual";

export function isVirtualNodeId(id: string): boolean {
  return id === VIRTUAL_START || id === VIRTUAL_END;
}

/** Outcome of {@link repairPlan}. */
export interface RepairOutcome {
  /** The same plan instance that was passed in, possibly mutated. */
  plan: Plan;
  repaired: boolean;
  /** One line per change that was applied. */
  repairs: string[];
  /** Defects the engine left alone (cycles). */
  unresolved: string[];
}

/** Pluggable repair strategy; the orchestrator defaults to {@link repairPlan}. */
export type PlanRepairStrategy = (plan: Plan) => RepairOutcome;

/**
 * Reconnects a plan made of several weakly connected components through a
 * single virtual START and END. Existing virtual nodes are reused, existing
 * arcs are not duplicated, and a connected plan is left untouched. Cycles are
 * never cut: they are reported in {@link RepairOutcome.unresolved}.
 */
export function repairPlan(plan: Plan): RepairOutcome {
  const graph = buildGraph(plan);
  const repairs: string[] = [];
  const unresolved = detectCycles(graph).cycles.map(
    (cycle) => `cycle left in place: ${[...cycle, cycle[0]].join(" -> ")}`,
  );

  const components = weaklyConnectedComponents(graph);
  if (components.length <= 1) {
    return { plan, repaired: false, repairs, unresolved };
  }

  for (const [id, description] of [
    [VIRTUAL_START, "Virtual start node (plan initialisation)"],
    [VIRTUAL_END, "Virtual end node (plan completion)"],
  ] as const) {
    if (!plan.hasNode(id)) {
      plan.addNode(virtualNode(id, description));
      repairs.push(`added virtual node ${id}`);
    }
  }

  let arcsAdded = 0;
  const connect = (source: string, target: string): void => {
    if (!plan.hasEdge(source, target)) {
      plan.addEdge({ source, target });
      arcsAdded += 1;
    }
  };

  for (const component of components) {
    const { entries, exits } = endpointsOf(graph, component);
    for (const entry of entries) {
      connect(VIRTUAL_START, entry);
    }
    for (const exit of exits) {
      connect(exit, VIRTUAL_END);
    }
  }

  repairs.push(`connected ${components.length} components through ${VIRTUAL_START}/${VIRTUAL_END} (${arcsAdded} arcs added)`);
  return { plan, repaired: true, repairs, unresolved };
}

/**
 * Entry points are the component's in-degree-zero actions and exit points its
 * out-degree-zero actions; virtual nodes are never endpoints. A component
 * already hanging off `__START__` needs no extra entry arcs for the actions
 * it reaches. Only a component without any in-degree-zero node (virtual ones
 * included) falls back to all of its actions as entry points.
 */
function endpointsOf(graph: PlanGraph, component: readonly string[]): { entries: string[]; exits: string[] } {
  const actions = component.filter((id) => !isVirtualNodeId(id));
  const roots = actions.filter((id) => graph.inDegree(id) === 0);
  const rooted = roots.length > 0 || component.some((id) => isVirtualNodeId(id) && graph.inDegree(id) === 0);
  return {
    entries: rooted ? roots : actions,
    exits: actions.filter((id) => graph.outDegree(id) === 0),
  };
}

function virtualNode(id: string, description: string): ActionNode {
  return { id, kind: VIRTUAL_KIND, params: {}, description };
}
