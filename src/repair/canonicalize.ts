import type { ActionNode, DependencyEdge, Plan } from "../plan/model.js";
import { buildGraph } from "../plan/graph.js";
import { topologicalOrder } from "../plan/algorithms/topological.js";
import { isVirtualNodeId } from "./repair.js";

export interface CanonicalizeOutcome {
  plan: Plan;
  /** Original id → canonical id, for every renamed action. */
  idMap: Map<string, string>;
  /** Number of duplicate arcs dropped. */
  droppedArcs: number;
}

/**
 * Renames actions to `action_1`, `action_2`, … following the topological
 * order (declaration order when the graph has a cycle), appends the former id
 * to each description and drops duplicate arcs. Virtual nodes keep their ids
 * so a later repair still recognises them. The plan is rewritten in place and
 * its nodes are re-declared in the new order.
 */
export function canonicalizePlan(plan: Plan): CanonicalizeOutcome {
  const graph = buildGraph(plan);
  const order = topologicalOrder(graph) ?? plan.nodes.map((node) => node.id);

  const idMap = new Map<string, string>();
  const nodes: ActionNode[] = [];
  let counter = 0;
  for (const id of order) {
    const node = plan.getNode(id);
    if (!node) {
      continue;
    }
    if (isVirtualNodeId(id)) {
      nodes.push(node);
      continue;
    }
    counter += 1;
    const canonicalId = `action_${counter}`;
    idMap.set(id, canonicalId);
    nodes.push({
      ...node,
      id: canonicalId,
      description: canonicalId === id ? node.description : appendTrace(node.description, id),
    });
  }

  const rename = (id: string): string => idMap.get(id) ?? id;
  const seen = new Set<string>();
  const edges: DependencyEdge[] = [];
  let droppedArcs = 0;
  for (const edge of plan.edges) {
    const renamed = { source: rename(edge.source), target: rename(edge.target) };
    const key = JSON.stringify([renamed.source, renamed.target]);
    if (seen.has(key)) {
      droppedArcs += 1;
      continue;
    }
    seen.add(key);
    edges.push(renamed);
  }

  plan.replaceContents(nodes, edges);
  return { plan, idMap, droppedArcs };
}

function appendTrace(description: string, originalId: string): string {
  const trace = `[was: ${originalId}]`;
  return description.trim().length > 0 ? `${description} ${trace}` : trace;
}
