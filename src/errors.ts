import { ERROR_CODES, type ErrorCode } from "./types.js";

/** Single problem found while validating a plan payload or its references. */
export interface PlanIssue {
  /** JSON-pointer like location of the offending entry (e.g. `/edges/2`). */
  path: string;
  message: string;
}

/**
 * Raised before any verification layer runs when the plan object itself is
 * unusable: duplicated or empty node ids, edges naming unknown nodes, or a
 * payload that does not match the plan schema. Callers must fix the plan;
 * retrying verification cannot help.
 */
export class MalformedPlanError extends Error {
  public readonly code: ErrorCode = ERROR_CODES.PLAN_MALFORMED;

  constructor(readonly issues: PlanIssue[]) {
    super(issues.map((issue) => `${issue.path}: ${issue.message}`).join("; "));
    this.name = "MalformedPlanError";
  }
}

/**
 * Raised by a world-state transition when an action's precondition does not
 * hold. The simulator converts it into the first (and only) entry of the
 * physics layer; it never escapes a simulation run.
 */
export class PhysicsViolationError extends Error {
  public readonly code: ErrorCode = ERROR_CODES.PHYSICS_VIOLATION;

  constructor(readonly condition: string) {
    super(condition);
    this.name = "PhysicsViolationError";
  }
}

/** Raised when an initial world-state description does not match the domain schema. */
export class InvalidWorldStateError extends Error {
  public readonly code: ErrorCode = ERROR_CODES.PHYSICS_INVALID_STATE;

  constructor(readonly issues: PlanIssue[]) {
    super(`invalid initial state: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`);
    this.name = "InvalidWorldStateError";
  }
}

/**
 * Raised by an external checker adapter when the checker cannot be consulted
 * (missing executable, foreign binary format, timeout). The orchestrator
 * downgrades the symbolic layer to "skipped".
 */
export class ExternalCheckerUnavailableError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ExternalCheckerUnavailableError";
    this.code = options.timedOut ? ERROR_CODES.CHECKER_TIMEOUT : ERROR_CODES.CHECKER_UNAVAILABLE;
  }
}

/**
 * Describes the terminal state reached when the bounded repair loop runs out
 * of structural attempts. The orchestrator records it on the result and copies
 * its message into the structural layer instead of throwing.
 */
export class RepairExhaustedError extends Error {
  public readonly code: ErrorCode = ERROR_CODES.REPAIR_EXHAUSTED;

  constructor(readonly attempts: number) {
    super(`repair exhausted after ${attempts} structural attempts`);
    this.name = "RepairExhaustedError";
  }
}
