import type { PlanGraph } from "../graph.js";

export interface CycleDetectionResult {
  readonly hasCycle: boolean;
  /** Each cycle lists its vertices once, starting from the first one entered. */
  readonly cycles: string[][];
}

const WHITE = 0;
const GREY = 1;
const BLACK = 2;

/**
 * Detects directed cycles with a white/grey/black depth-first search. A back
 * arc to a grey vertex closes a cycle made of the stack suffix starting at
 * that vertex, so a self-loop on `x` is reported as `["x"]`. Cycles found
 * through duplicate arcs are reported once.
 */
export function detectCycles(graph: PlanGraph, limit = 20): CycleDetectionResult {
  const colour = new Map<string, number>();
  const stack: string[] = [];
  const cycles: string[][] = [];
  const seen = new Set<string>();

  const visit = (vertexId: string): void => {
    colour.set(vertexId, GREY);
    stack.push(vertexId);
    for (const next of graph.successors(vertexId)) {
      if (cycles.length >= limit) {
        break;
      }
      const state = colour.get(next) ?? WHITE;
      if (state === GREY) {
        const cycle = stack.slice(stack.indexOf(next));
        const key = cycle.join("\u0000");
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(cycle);
        }
        continue;
      }
      if (state === WHITE) {
        visit(next);
      }
    }
    colour.set(vertexId, BLACK);
    stack.pop();
  };

  for (const vertex of graph.listVertices()) {
    if (cycles.length >= limit) {
      break;
    }
    if ((colour.get(vertex.id) ?? WHITE) === WHITE) {
      visit(vertex.id);
    }
  }

  return { hasCycle: cycles.length > 0, cycles };
}
