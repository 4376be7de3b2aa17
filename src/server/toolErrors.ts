import { z } from "zod";

import { InvalidWorldStateError, MalformedPlanError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES, fail, type ToolFailure } from "../types.js";

/**
 * Structured payload returned by tool handlers when an error occurs. The MCP
 * transport expects the `content` array to contain textual JSON so clients
 * can parse the code, hint and optional details.
 */
export interface ToolErrorResponse {
  [key: string]: unknown;
  isError: true;
  content: Array<{ type: "text"; text: string }>;
}

/** {@link ToolFailure} enriched with the tool name and optional details. */
export interface PlanToolFailure extends ToolFailure {
  tool: string;
  details?: unknown;
}

/**
 * Maps a thrown error onto a stable code. Zod and initial-state errors become
 * invalid-input failures, malformed plans keep their own code, anything else
 * is reported as unexpected.
 */
export function normaliseToolError(toolName: string, error: unknown): PlanToolFailure {
  if (error instanceof MalformedPlanError) {
    return {
      ...fail(error.code, error.message, "fix the plan payload; retrying will not help"),
      tool: toolName,
      details: { issues: error.issues },
    };
  }
  if (error instanceof InvalidWorldStateError) {
    return { ...fail(error.code, error.message, "invalid_initial_state"), tool: toolName, details: { issues: error.issues } };
  }
  if (error instanceof z.ZodError) {
    return {
      ...fail(ERROR_CODES.PLAN_INVALID_INPUT, error.message, "invalid_input"),
      tool: toolName,
      details: { issues: error.issues },
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { ...fail(ERROR_CODES.PLAN_UNEXPECTED, message), tool: toolName };
}

/** Logs the failure under `<tool>_failed` and wraps it as an MCP error result. */
export function planToolError(
  logger: StructuredLogger,
  toolName: string,
  error: unknown,
  context: Record<string, unknown> = {},
): ToolErrorResponse {
  const failure = normaliseToolError(toolName, error);
  logger.error(`${toolName}_failed`, { ...context, code: failure.code, message: failure.message });
  return {
    isError: true,
    content: [{ type: "text", text: JSON.stringify(failure, null, 2) }],
  };
}
