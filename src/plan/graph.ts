import { MalformedPlanError, type PlanIssue } from "../errors.js";
import type { ActionNode, DependencyEdge, Plan } from "./model.js";

/** Vertex of the graph view, remembering where the action was declared. */
export interface PlanVertex {
  readonly id: string;
  /** Position of the node in the plan's declaration order. */
  readonly index: number;
  readonly node: ActionNode;
}

/**
 * Directed graph projection of a {@link Plan}. Vertices keep declaration
 * order; adjacency lists keep duplicate arcs so degree counts match the plan.
 */
export class PlanGraph {
  private readonly vertices: Map<string, PlanVertex>;
  private readonly outgoing: Map<string, string[]>;
  private readonly incoming: Map<string, string[]>;

  constructor(
    nodes: readonly ActionNode[],
    readonly arcs: readonly DependencyEdge[],
  ) {
    this.vertices = new Map();
    this.outgoing = new Map();
    this.incoming = new Map();

    nodes.forEach((node, index) => {
      this.vertices.set(node.id, { id: node.id, index, node });
      this.outgoing.set(node.id, []);
      this.incoming.set(node.id, []);
    });
    for (const arc of arcs) {
      this.outgoing.get(arc.source)?.push(arc.target);
      this.incoming.get(arc.target)?.push(arc.source);
    }
  }

  get size(): number {
    return this.vertices.size;
  }

  hasVertex(id: string): boolean {
    return this.vertices.has(id);
  }

  getVertex(id: string): PlanVertex | undefined {
    return this.vertices.get(id);
  }

  /** Declaration index of {@link id}; unknown ids sort last. */
  indexOf(id: string): number {
    return this.vertices.get(id)?.index ?? Number.MAX_SAFE_INTEGER;
  }

  /** Vertices in declaration order. */
  listVertices(): PlanVertex[] {
    return Array.from(this.vertices.values());
  }

  successors(id: string): readonly string[] {
    return this.outgoing.get(id) ?? [];
  }

  predecessors(id: string): readonly string[] {
    return this.incoming.get(id) ?? [];
  }

  inDegree(id: string): number {
    return this.predecessors(id).length;
  }

  outDegree(id: string): number {
    return this.successors(id).length;
  }
}

/**
 * Builds the graph view of {@link plan}. Every edge endpoint must name a
 * declared node; dangling references raise {@link MalformedPlanError} instead
 * of silently creating vertices.
 */
export function buildGraph(plan: Plan): PlanGraph {
  const declared = new Set(plan.nodes.map((node) => node.id));
  const issues: PlanIssue[] = [];
  plan.edges.forEach((edge, index) => {
    for (const endpoint of [edge.source, edge.target]) {
      if (!declared.has(endpoint)) {
        issues.push({
          path: `/edges/${index}`,
          message: `edge '${edge.source}' -> '${edge.target}' references unknown node '${endpoint}'`,
        });
      }
    }
  });
  if (issues.length > 0) {
    throw new MalformedPlanError(issues);
  }
  return new PlanGraph(plan.nodes, plan.edges);
}
