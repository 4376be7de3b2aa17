import { z } from "zod";

import { MalformedPlanError, type PlanIssue } from "../errors.js";

/** Atomic action of a plan. Corresponds to one vertex of the plan graph. */
export interface ActionNode {
  readonly id: string;
  /** Free-form action tag such as `pick-up` or `stack`. */
  readonly kind: string;
  readonly params: Readonly<Record<string, string>>;
  /** Display-only text; never consulted by the verification layers. */
  readonly description: string;
}

/** `source` must complete before `target`. */
export interface DependencyEdge {
  readonly source: string;
  readonly target: string;
}

/** Plain description accepted by the {@link Plan} constructor. */
export interface PlanInit {
  goal: string;
  nodes: readonly ActionNode[];
  edges?: readonly DependencyEdge[];
}

/**
 * Goal, actions in declaration order and their ordering dependencies.
 *
 * The constructor rejects empty and duplicated node ids. Edge endpoints are
 * not checked here: {@link buildGraph} performs that check so that a plan
 * under repair may be inspected before it is analysed.
 */
export class Plan {
  readonly goal: string;
  private nodeList: ActionNode[];
  private edgeList: DependencyEdge[];

  constructor(init: PlanInit) {
    const issues = collectNodeIssues(init.nodes);
    if (issues.length > 0) {
      throw new MalformedPlanError(issues);
    }
    this.goal = init.goal;
    this.nodeList = init.nodes.map(freezeNode);
    this.edgeList = (init.edges ?? []).map(freezeEdge);
  }

  get nodes(): readonly ActionNode[] {
    return this.nodeList;
  }

  get edges(): readonly DependencyEdge[] {
    return this.edgeList;
  }

  hasNode(id: string): boolean {
    return this.nodeList.some((node) => node.id === id);
  }

  getNode(id: string): ActionNode | undefined {
    return this.nodeList.find((node) => node.id === id);
  }

  hasEdge(source: string, target: string): boolean {
    return this.edgeList.some((edge) => edge.source === source && edge.target === target);
  }

  /** Appends a node; the id must not already be declared. */
  addNode(node: ActionNode): void {
    const issues = collectNodeIssues([...this.nodeList, node]);
    if (issues.length > 0) {
      throw new MalformedPlanError(issues);
    }
    this.nodeList.push(freezeNode(node));
  }

  addEdge(edge: DependencyEdge): void {
    this.edgeList.push(freezeEdge(edge));
  }

  /**
   * Swaps the whole node and edge lists at once. Used by canonicalisation,
   * which renames identifiers and therefore rewrites both sides together.
   */
  replaceContents(nodes: readonly ActionNode[], edges: readonly DependencyEdge[]): void {
    const issues = collectNodeIssues(nodes);
    if (issues.length > 0) {
      throw new MalformedPlanError(issues);
    }
    this.nodeList = nodes.map(freezeNode);
    this.edgeList = edges.map(freezeEdge);
  }

  /** Deep copy, so that repair can be attempted without touching the caller's plan. */
  clone(): Plan {
    return new Plan({ goal: this.goal, nodes: this.nodeList, edges: this.edgeList });
  }

  toJSON(): PlanPayload {
    return {
      goal: this.goal,
      nodes: this.nodeList.map((node) => ({
        id: node.id,
        kind: node.kind,
        params: { ...node.params },
        description: node.description,
      })),
      edges: this.edgeList.map((edge) => ({ source: edge.source, target: edge.target })),
    };
  }
}

function collectNodeIssues(nodes: readonly ActionNode[]): PlanIssue[] {
  const issues: PlanIssue[] = [];
  const seen = new Set<string>();
  nodes.forEach((node, index) => {
    if (node.id.trim().length === 0) {
      issues.push({ path: `/nodes/${index}`, message: "node id must not be empty" });
      return;
    }
    if (seen.has(node.id)) {
      issues.push({ path: `/nodes/${index}`, message: `duplicate node identifier '${node.id}'` });
    }
    seen.add(node.id);
  });
  return issues;
}

function freezeNode(node: ActionNode): ActionNode {
  return Object.freeze({
    id: node.id,
    kind: node.kind,
    params: Object.freeze({ ...node.params }),
    description: node.description,
  });
}

function freezeEdge(edge: DependencyEdge): DependencyEdge {
  return Object.freeze({ source: edge.source, target: edge.target });
}

/** Scalar parameter values are accepted and stored as strings. */
const ParamValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

/**
 * Node payload. Planner output historically used `action_type`; both spellings
 * are accepted and `kind` wins when both are present.
 */
const ActionNodeSchema = z
  .object({
    id: z.string().trim().min(1, "node id must not be empty"),
    kind: z.string().trim().min(1, "action kind must not be empty").optional(),
    action_type: z.string().trim().min(1, "action kind must not be empty").optional(),
    params: z.record(ParamValueSchema).default({}),
    description: z.string().default(""),
  })
  .refine((node) => node.kind !== undefined || node.action_type !== undefined, {
    message: "node must declare an action kind",
    path: ["kind"],
  })
  .transform(
    (node): ActionNode => ({
      id: node.id,
      kind: node.kind ?? node.action_type ?? "",
      params: node.params,
      description: node.description,
    }),
  );

const DependencyEdgeSchema = z
  .object({
    source: z.string().trim().min(1, "edge.source must reference a node"),
    target: z.string().trim().min(1, "edge.target must reference a node"),
  })
  .passthrough()
  .transform((edge): DependencyEdge => ({ source: edge.source, target: edge.target }));

/** Zod schema validating raw plan payloads (tool calls, JSON fixtures). */
export const PlanPayloadSchema = z.object({
  goal: z.string().default(""),
  goal_description: z.string().optional(),
  nodes: z.array(ActionNodeSchema),
  edges: z.array(DependencyEdgeSchema).default([]),
});

/** JSON shape produced by {@link Plan.toJSON}. */
export interface PlanPayload {
  goal: string;
  nodes: Array<{ id: string; kind: string; params: Record<string, string>; description: string }>;
  edges: Array<{ source: string; target: string }>;
}

/**
 * Validates an untrusted payload and builds a {@link Plan}. Schema problems
 * and duplicated ids are both reported through {@link MalformedPlanError}.
 */
export function parsePlan(payload: unknown): Plan {
  const parsed = PlanPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedPlanError(
      parsed.error.issues.map((issue) => ({ path: `/${issue.path.join("/")}`, message: issue.message })),
    );
  }
  const { goal, goal_description: goalDescription, nodes, edges } = parsed.data;
  return new Plan({ goal: goal.length > 0 ? goal : goalDescription ?? "", nodes, edges });
}
