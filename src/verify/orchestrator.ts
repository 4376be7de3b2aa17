import { ExternalCheckerUnavailableError, RepairExhaustedError } from "../errors.js";
import type { ExternalChecker } from "../checker/external.js";
import { defaultDomainRegistry, type DomainProfile, type DomainRegistry } from "../domain/registry.js";
import type { DomainSimulator } from "../sim/simulator.js";
import { ERROR_CODES, type ErrorCode } from "../types.js";
import type { StructuredLogger } from "../logger.js";
import { buildGraph } from "../plan/graph.js";
import type { Plan } from "../plan/model.js";
import { canonicalizePlan } from "../repair/canonicalize.js";
import { repairPlan, type PlanRepairStrategy } from "../repair/repair.js";
import { hasDefect, verifyStructure, type StructuralReport } from "./structural.js";

/** Default bound on structural verification passes (1 initial + 2 after repair). */
export const DEFAULT_MAX_STRUCTURAL_ATTEMPTS = 3;

export const REPAIR_NO_PROGRESS_MESSAGE = "repair could not restore structural validity";

export const NO_CHECKER_REASON = "no external checker configured";

export type LayerStatus = "passed" | "failed" | "skipped";

/**
 * Verdict of one verification layer. Skipped layers carry `valid: null` and a
 * `reason` so callers never mistake them for passed ones.
 */
export interface LayerResult {
  status: LayerStatus;
  valid: boolean | null;
  errors: string[];
  /** Catalogue code of the defect that failed the layer, when one applies. */
  code?: ErrorCode;
  reason?: string;
}

export interface VerificationResult {
  structural: LayerResult;
  physics: LayerResult;
  symbolic: LayerResult;
  /** AND over the layers that actually ran. */
  overallValid: boolean;
  executionOrder: string[] | null;
  /** Grounded action strings in execution order (virtual nodes dropped). */
  actions: string[] | null;
  repairs: string[];
  structuralAttempts: number;
  repaired: boolean;
  /** Original id → canonical id when canonicalisation ran. */
  canonicalIds: Record<string, string> | null;
  /** Set when the structural loop ran out of attempts. */
  exhausted: RepairExhaustedError | null;
  plan: Plan;
}

/** Inputs for the optional symbolic layer. */
export interface SymbolicCheckOptions {
  checker: ExternalChecker;
  domainText: string;
  problemText: string;
}

export interface VerifyOptions {
  maxStructuralAttempts?: number;
  /** Renumber action ids after a successful repair. */
  canonicalize?: boolean;
  logger?: StructuredLogger;
  registry?: DomainRegistry;
  repair?: PlanRepairStrategy;
  symbolic?: SymbolicCheckOptions;
  /** Reason reported on the symbolic layer when {@link symbolic} is absent. */
  symbolicSkipReason?: string;
}

interface StructuralPhase {
  report: StructuralReport;
  layer: LayerResult;
  attempts: number;
  repaired: boolean;
  repairs: string[];
  exhausted: RepairExhaustedError | null;
}

function passed(): LayerResult {
  return { status: "passed", valid: true, errors: [] };
}

function failed(errors: string[], code?: ErrorCode): LayerResult {
  return code === undefined ? { status: "failed", valid: false, errors } : { status: "failed", valid: false, errors, code };
}

function skipped(reason: string): LayerResult {
  return { status: "skipped", valid: null, errors: [], reason };
}

/**
 * Verifies a plan layer by layer and repairs disconnected graphs along the
 * way. The plan is mutated in place by repair and canonicalisation; the
 * caller must not share it with a concurrent verification.
 *
 * Malformed plans ({@link MalformedPlanError}) and unusable initial states
 * ({@link InvalidWorldStateError}) are thrown. Every other defect is reported
 * inside the returned layers.
 */
export async function verifyAndRepair(
  plan: Plan,
  domain: string,
  initialState?: unknown,
  options: VerifyOptions = {},
): Promise<VerificationResult> {
  const maxAttempts = options.maxStructuralAttempts ?? DEFAULT_MAX_STRUCTURAL_ATTEMPTS;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError("maxStructuralAttempts must be a positive integer");
  }
  const logger = options.logger;
  const registry = options.registry ?? defaultDomainRegistry;

  logger?.info("plan_verify_started", {
    domain,
    goal: plan.goal,
    nodes: plan.nodes.length,
    edges: plan.edges.length,
    has_initial_state: initialState !== undefined && initialState !== null,
  });

  const structural = runStructuralPhase(plan, maxAttempts, options.repair ?? repairPlan, logger);
  let order = structural.report.order;

  let canonicalIds: Record<string, string> | null = null;
  if (structural.report.valid && structural.repaired && options.canonicalize) {
    const outcome = canonicalizePlan(plan);
    canonicalIds = Object.fromEntries(outcome.idMap);
    order = verifyStructure(buildGraph(plan)).order;
  }

  const profile = registry.resolve(domain);
  let actions: string[] | null = null;
  let physics: LayerResult;
  let symbolic: LayerResult;

  if (!structural.report.valid || order === null) {
    physics = skipped("structural verification failed");
    symbolic = skipped("structural verification failed");
  } else if (!profile) {
    physics = skipped(`unsupported domain '${domain}'`);
    symbolic = skipped(`unsupported domain '${domain}'`);
  } else {
    const mapped = mapActions(plan, order, profile);
    const simulation = planSimulation(profile, initialState);
    if (mapped.errors.length > 0) {
      physics = simulation.run
        ? failed(mapped.errors, ERROR_CODES.PHYSICS_MAPPING)
        : skipped(`${simulation.reason}; unmapped actions: ${mapped.errors.join("; ")}`);
      symbolic = skipped("actions could not be mapped");
    } else {
      actions = mapped.actions;
      physics = simulation.run ? runPhysics(simulation.simulator, actions, initialState) : skipped(simulation.reason);
      symbolic = await runSymbolic(actions, options.symbolic, options.symbolicSkipReason);
    }
  }

  logger?.info("plan_physics_checked", {
    status: physics.status,
    errors: physics.errors,
    ...(physics.reason ? { reason: physics.reason } : {}),
  });
  if (options.symbolic) {
    logger?.info("plan_symbolic_checked", {
      checker: options.symbolic.checker.name,
      status: symbolic.status,
      errors: symbolic.errors,
      ...(symbolic.reason ? { reason: symbolic.reason } : {}),
    });
  }

  const overallValid = [structural.layer, physics, symbolic].every((layer) => layer.valid !== false);

  const result: VerificationResult = {
    structural: structural.layer,
    physics,
    symbolic,
    overallValid,
    executionOrder: structural.report.valid ? order : null,
    actions,
    repairs: structural.repairs,
    structuralAttempts: structural.attempts,
    repaired: structural.repaired,
    canonicalIds,
    exhausted: structural.exhausted,
    plan,
  };

  logger?.info("plan_verify_completed", {
    domain,
    overall_valid: overallValid,
    structural: structural.layer.status,
    physics: physics.status,
    symbolic: symbolic.status,
    attempts: structural.attempts,
    repaired: structural.repaired,
  });
  return result;
}

/**
 * STRUCTURAL → (REPAIR → STRUCTURAL)* bounded by {@link maxAttempts}. Only a
 * disconnection is handed to the repair strategy; empty and cyclic plans stop
 * at once.
 */
function runStructuralPhase(
  plan: Plan,
  maxAttempts: number,
  repair: PlanRepairStrategy,
  logger: StructuredLogger | undefined,
): StructuralPhase {
  const repairs: string[] = [];
  let repaired = false;
  let attempts = 0;

  for (;;) {
    attempts += 1;
    const report = verifyStructure(buildGraph(plan));
    logger?.info("plan_structure_checked", {
      attempt: attempts,
      valid: report.valid,
      errors: report.errors,
      components: report.components.length,
      cycles: report.cycles.length,
    });

    if (report.valid) {
      return { report, layer: passed(), attempts, repaired, repairs, exhausted: null };
    }
    const done = (
      extra: string[],
      code: ErrorCode | undefined = report.defects[0]?.code,
      exhausted: RepairExhaustedError | null = null,
    ): StructuralPhase => ({
      report,
      layer: failed([...report.errors, ...extra], code),
      attempts,
      repaired,
      repairs,
      exhausted,
    });

    if (hasDefect(report, "empty") || hasDefect(report, "cycle")) {
      return done([]);
    }
    if (attempts >= maxAttempts) {
      const exhausted = new RepairExhaustedError(attempts);
      logger?.warn("plan_repair_exhausted", { attempts, errors: report.errors });
      return done([exhausted.message], exhausted.code, exhausted);
    }

    const outcome = repair(plan);
    if (!outcome.repaired) {
      return done([REPAIR_NO_PROGRESS_MESSAGE], ERROR_CODES.REPAIR_NO_PROGRESS);
    }
    repaired = true;
    repairs.push(...outcome.repairs);
    logger?.info("plan_repair_applied", {
      attempt: attempts,
      repairs: outcome.repairs,
      unresolved: outcome.unresolved,
      nodes: plan.nodes.length,
      edges: plan.edges.length,
    });
  }
}

function mapActions(plan: Plan, order: readonly string[], profile: DomainProfile): { actions: string[]; errors: string[] } {
  const actions: string[] = [];
  const errors: string[] = [];
  for (const id of order) {
    const node = plan.getNode(id);
    if (!node) {
      continue;
    }
    const mapping = profile.mapper(node);
    switch (mapping.status) {
      case "mapped":
        actions.push(mapping.action);
        break;
      case "error":
        errors.push(mapping.message);
        break;
      case "skip":
        break;
    }
  }
  return { actions, errors };
}

type SimulationPlan = { run: true; simulator: DomainSimulator } | { run: false; reason: string };

/** Decided before mapping so that a layer that cannot run is never failed. */
function planSimulation(profile: DomainProfile, initialState: unknown): SimulationPlan {
  if (!profile.simulator) {
    return { run: false, reason: `no simulator for domain '${profile.name}'` };
  }
  if (initialState === undefined || initialState === null) {
    return { run: false, reason: "no initial state provided" };
  }
  return { run: true, simulator: profile.simulator };
}

function runPhysics(simulator: DomainSimulator, actions: readonly string[], initialState: unknown): LayerResult {
  const report = simulator.simulate(actions, initialState);
  return report.valid ? passed() : failed(report.errors, report.code ?? ERROR_CODES.PHYSICS_VIOLATION);
}

async function runSymbolic(
  actions: readonly string[],
  symbolic: SymbolicCheckOptions | undefined,
  skipReason = NO_CHECKER_REASON,
): Promise<LayerResult> {
  if (!symbolic) {
    return skipped(skipReason);
  }
  try {
    const verdict = await symbolic.checker.check({
      domainText: symbolic.domainText,
      problemText: symbolic.problemText,
      actions,
    });
    return verdict.valid ? passed() : failed(verdict.errors);
  } catch (error) {
    if (error instanceof ExternalCheckerUnavailableError) {
      return skipped(error.message);
    }
    throw error;
  }
}
