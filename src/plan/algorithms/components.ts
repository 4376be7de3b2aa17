import type { PlanGraph } from "../graph.js";

/**
 * Weakly connected components, computed with a union-find over the arcs taken
 * as undirected. Members keep declaration order and components are sorted by
 * their first member, so the output is stable for a given plan.
 */
export function weaklyConnectedComponents(graph: PlanGraph): string[][] {
  const parent = new Map<string, string>();
  for (const vertex of graph.listVertices()) {
    parent.set(vertex.id, vertex.id);
  }

  const find = (id: string): string => {
    let root = id;
    let next = parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = parent.get(root);
    }
    // Path compression.
    let cursor = id;
    while (cursor !== root) {
      const up = parent.get(cursor) ?? root;
      parent.set(cursor, root);
      cursor = up;
    }
    return root;
  };

  const union = (a: string, b: string): void => {
    const rootA = find(a);
    const rootB = find(b);
    if (rootA === rootB) {
      return;
    }
    // Keep the earliest declared vertex as root.
    if (graph.indexOf(rootA) <= graph.indexOf(rootB)) {
      parent.set(rootB, rootA);
    } else {
      parent.set(rootA, rootB);
    }
  };

  for (const arc of graph.arcs) {
    if (graph.hasVertex(arc.source) && graph.hasVertex(arc.target)) {
      union(arc.source, arc.target);
    }
  }

  const groups = new Map<string, string[]>();
  for (const vertex of graph.listVertices()) {
    const root = find(vertex.id);
    const members = groups.get(root);
    if (members) {
      members.push(vertex.id);
    } else {
      groups.set(root, [vertex.id]);
    }
  }
  return Array.from(groups.values());
}
