import { ERROR_CODES, type ErrorCode } from "../types.js";
import { detectCycles } from "../plan/algorithms/cycles.js";
import { weaklyConnectedComponents } from "../plan/algorithms/components.js";
import { topologicalOrder } from "../plan/algorithms/topological.js";
import type { PlanGraph } from "../plan/graph.js";

/** Kind of structural defect. Only `disconnected` can be repaired automatically. */
export type StructuralDefectKind = "empty" | "disconnected" | "cycle";

export interface StructuralDefect {
  kind: StructuralDefectKind;
  code: ErrorCode;
  message: string;
}

/** Outcome of {@link verifyStructure}. */
export interface StructuralReport {
  valid: boolean;
  /** Human readable messages, one per defect, in detection order. */
  errors: string[];
  defects: StructuralDefect[];
  /** Weakly connected components (empty for an empty plan). */
  components: string[][];
  cycles: string[][];
  /** Execution order; only computed when the structure is valid. */
  order: string[] | null;
}

export const EMPTY_PLAN_MESSAGE = "plan has no actions";

/**
 * Decides whether the plan graph is well formed: non-empty, weakly connected
 * and acyclic. When it is, the report carries a deterministic topological
 * order. The graph is never modified.
 */
export function verifyStructure(graph: PlanGraph): StructuralReport {
  if (graph.size === 0) {
    const defect: StructuralDefect = {
      kind: "empty",
      code: ERROR_CODES.STRUCT_EMPTY,
      message: EMPTY_PLAN_MESSAGE,
    };
    return { valid: false, errors: [defect.message], defects: [defect], components: [], cycles: [], order: null };
  }

  const defects: StructuralDefect[] = [];

  const components = weaklyConnectedComponents(graph);
  if (components.length > 1) {
    defects.push({
      kind: "disconnected",
      code: ERROR_CODES.STRUCT_DISCONNECTED,
      message: `plan graph is disconnected: ${components.length} weakly connected components`,
    });
  }

  const { cycles } = detectCycles(graph);
  for (const cycle of cycles) {
    defects.push({
      kind: "cycle",
      code: ERROR_CODES.STRUCT_CYCLE,
      message: `cycle detected: ${[...cycle, cycle[0]].join(" -> ")}`,
    });
  }

  const valid = defects.length === 0;
  return {
    valid,
    errors: defects.map((defect) => defect.message),
    defects,
    components,
    cycles,
    order: valid ? topologicalOrder(graph) : null,
  };
}

/** True when at least one defect of {@link kind} was reported. */
export function hasDefect(report: StructuralReport, kind: StructuralDefectKind): boolean {
  return report.defects.some((defect) => defect.kind === kind);
}
