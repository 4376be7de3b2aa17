import type { ErrorCode } from "../types.js";

/** Outcome of replaying an ordered action sequence against a world model. */
export interface PhysicsReport<Snapshot = unknown> {
  valid: boolean;
  /** At most one entry: replay stops at the first violation. */
  errors: string[];
  /** Catalogue code of the violation, `null` when every action applied. */
  code: ErrorCode | null;
  /** Index of the offending action, `null` when every action applied. */
  failedIndex: number | null;
  /** Number of actions applied before the replay stopped. */
  appliedCount: number;
  /** World state after the last applied action. */
  finalState: Snapshot;
}

/**
 * Domain physics validator. Implementations parse their own initial-state
 * description and throw {@link InvalidWorldStateError} when it is unusable.
 */
export interface DomainSimulator {
  readonly domain: string;
  simulate(actions: readonly string[], initialState: unknown): PhysicsReport;
}
