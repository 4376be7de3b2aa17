/**
 * Narrow request/response contract for an optional symbolic plan checker
 * (for instance the VAL plan validator). The verifier treats the checker as
 * an external collaborator: plan text goes in, a verdict comes out.
 */

export interface ExternalCheckRequest {
  /** Domain description (PDDL `define (domain ...)` text). */
  domainText: string;
  /** Problem description (PDDL `define (problem ...)` text). */
  problemText: string;
  /** Grounded actions in execution order, e.g. `(pick-up a)`. */
  actions: readonly string[];
}

export interface ExternalCheckVerdict {
  valid: boolean;
  errors: string[];
}

/**
 * Implementations reject with {@link ExternalCheckerUnavailableError} when the
 * checker cannot be consulted at all; any verdict they resolve with is taken
 * at face value.
 */
export interface ExternalChecker {
  readonly name: string;
  check(request: ExternalCheckRequest): Promise<ExternalCheckVerdict>;
}
