import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { ExternalChecker } from "../checker/external.js";
import { createValChecker } from "../checker/val.js";
import { loadVerifierSettings, type VerifierSettings } from "../config/settings.js";
import { StructuredLogger } from "../logger.js";
import { parsePlan, type PlanPayload } from "../plan/model.js";
import { repairPlan } from "../repair/repair.js";
import { parseBlocksworldProblem } from "../sim/pddlProblem.js";
import { verifyAndRepair, type LayerResult, type SymbolicCheckOptions, type VerificationResult } from "../verify/orchestrator.js";
import { planToolError } from "./toolErrors.js";

export const SERVER_NAME = "plan-verifier";
export const SERVER_VERSION = "0.1.0";

const PlanInputSchema = z
  .object({})
  .passthrough()
  .describe("Plan payload: { goal, nodes: [{ id, kind, params, description }], edges: [{ source, target }] }");

/** Input shape of `plan_verify`. */
export const PlanVerifyInputShape = {
  plan: PlanInputSchema,
  domain: z.string().trim().min(1).describe("Domain tag selecting the action mapping and simulator, e.g. blocksworld"),
  initial_state: z
    .object({})
    .passthrough()
    .optional()
    .describe("Domain-specific initial world description; takes precedence over problem_pddl"),
  problem_pddl: z.string().optional().describe("PDDL problem text; its :init section seeds the blocksworld simulator"),
  domain_pddl: z.string().optional().describe("PDDL domain text, required for the external symbolic check"),
  canonicalize: z.boolean().optional(),
  max_attempts: z.number().int().min(1).max(10).optional(),
};

/** Input shape of `plan_repair`. */
export const PlanRepairInputShape = {
  plan: PlanInputSchema,
};

export interface PlanVerifierServerOptions {
  settings?: VerifierSettings;
  logger?: StructuredLogger;
  /** Overrides the VAL checker built from {@link VerifierSettings.valPath}. */
  checker?: ExternalChecker | null;
}

/** JSON view of a {@link VerificationResult}. */
export type VerificationSummary = {
  overall_valid: boolean;
  layers: { structural: LayerResult; physics: LayerResult; symbolic: LayerResult };
  execution_order: string[] | null;
  actions: string[] | null;
  repairs: string[];
  structural_attempts: number;
  repaired: boolean;
  canonical_ids: Record<string, string> | null;
  plan: PlanPayload;
};

export function summariseVerification(result: VerificationResult): VerificationSummary {
  return {
    overall_valid: result.overallValid,
    layers: { structural: result.structural, physics: result.physics, symbolic: result.symbolic },
    execution_order: result.executionOrder,
    actions: result.actions,
    repairs: result.repairs,
    structural_attempts: result.structuralAttempts,
    repaired: result.repaired,
    canonical_ids: result.canonicalIds,
    plan: result.plan.toJSON(),
  };
}

/**
 * Builds an MCP server exposing `plan_verify` and `plan_repair`. Every call
 * parses its own plan so concurrent requests never share state.
 */
export function createPlanVerifierServer(options: PlanVerifierServerOptions = {}): McpServer {
  const settings = options.settings ?? loadVerifierSettings();
  const logger =
    options.logger ??
    new StructuredLogger({
      logFile: settings.logFile,
      minLevel: settings.logLevel,
      redactionEnabled: settings.logRedaction,
    });
  const checker =
    options.checker !== undefined
      ? options.checker
      : settings.valPath
        ? createValChecker({ executable: settings.valPath, timeoutMs: settings.valTimeoutMs })
        : null;

  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    "plan_verify",
    {
      title: "Verify plan",
      description:
        "Checks a dependency-graph plan for structure, domain physics and (when configured) a symbolic validator, repairing disconnected graphs on the way.",
      inputSchema: PlanVerifyInputShape,
    },
    async (input) => {
      try {
        const plan = parsePlan(input.plan);
        const problem = input.problem_pddl ? parseBlocksworldProblem(input.problem_pddl) : null;
        const initialState = input.initial_state ?? problem?.initialState;

        let symbolic: SymbolicCheckOptions | undefined;
        let symbolicSkipReason: string | undefined;
        if (checker && input.domain_pddl && input.problem_pddl) {
          symbolic = { checker, domainText: input.domain_pddl, problemText: input.problem_pddl };
        } else if (checker) {
          const absent = [input.domain_pddl ? null : "domain_pddl", input.problem_pddl ? null : "problem_pddl"].filter(
            (name): name is string => name !== null,
          );
          symbolicSkipReason = `external checker '${checker.name}' needs ${absent.join(" and ")}`;
        }

        const result = await verifyAndRepair(plan, input.domain, initialState, {
          maxStructuralAttempts: input.max_attempts ?? settings.maxStructuralAttempts,
          canonicalize: input.canonicalize ?? settings.canonicalize,
          logger,
          symbolic,
          symbolicSkipReason,
        });
        const summary = summariseVerification(result);
        return {
          content: [{ type: "text", text: JSON.stringify(summary, null, 2) }],
          structuredContent: summary,
        };
      } catch (error) {
        return planToolError(logger, "plan_verify", error, { domain: input.domain });
      }
    },
  );

  server.registerTool(
    "plan_repair",
    {
      title: "Repair plan",
      description: "Reconnects a disconnected plan through virtual start and end nodes without verifying domain physics.",
      inputSchema: PlanRepairInputShape,
    },
    async (input) => {
      try {
        const plan = parsePlan(input.plan);
        const outcome = repairPlan(plan);
        logger.info("plan_repair_applied", {
          repaired: outcome.repaired,
          repairs: outcome.repairs,
          unresolved: outcome.unresolved,
        });
        const payload = {
          repaired: outcome.repaired,
          repairs: outcome.repairs,
          unresolved: outcome.unresolved,
          plan: outcome.plan.toJSON(),
        };
        return {
          content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
          structuredContent: payload,
        };
      } catch (error) {
        return planToolError(logger, "plan_repair", error);
      }
    },
  );

  return server;
}
