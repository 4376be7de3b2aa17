import { DEFAULT_VAL_TIMEOUT_MS } from "../checker/val.js";
import type { LogLevel } from "../logger.js";
import { DEFAULT_MAX_STRUCTURAL_ATTEMPTS } from "../verify/orchestrator.js";
import { readBool, readEnum, readInt, readOptionalString, type EnvSource } from "./env.js";

/** Settings of the tool surface. The verification core only sees explicit options. */
export interface VerifierSettings {
  logFile: string | null;
  logLevel: LogLevel;
  logRedaction: boolean;
  maxStructuralAttempts: number;
  /** Path to the VAL `validate` executable; the symbolic layer is skipped when unset. */
  valPath: string | null;
  valTimeoutMs: number;
  canonicalize: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Builds {@link VerifierSettings} from environment variables:
 *
 * - `PLAN_VERIFIER_LOG_FILE`: mirror log lines to this file.
 * - `PLAN_VERIFIER_LOG_LEVEL`: minimum level (`info` by default).
 * - `PLAN_VERIFIER_LOG_REDACT`: redact secret-looking keys (on by default).
 * - `PLAN_VERIFIER_MAX_ATTEMPTS`: structural attempts, 1 to 10.
 * - `PLAN_VERIFIER_VAL_PATH`: VAL executable.
 * - `PLAN_VERIFIER_VAL_TIMEOUT_MS`: VAL timeout in milliseconds.
 * - `PLAN_VERIFIER_CANONICALIZE`: canonicalise ids after repair by default.
 */
export function loadVerifierSettings(env: EnvSource = process.env): VerifierSettings {
  return {
    logFile: readOptionalString("PLAN_VERIFIER_LOG_FILE", env) ?? null,
    logLevel: readEnum("PLAN_VERIFIER_LOG_LEVEL", LOG_LEVELS, "info", env),
    logRedaction: readBool("PLAN_VERIFIER_LOG_REDACT", true, env),
    maxStructuralAttempts: readInt(
      "PLAN_VERIFIER_MAX_ATTEMPTS",
      DEFAULT_MAX_STRUCTURAL_ATTEMPTS,
      { min: 1, max: 10 },
      env,
    ),
    valPath: readOptionalString("PLAN_VERIFIER_VAL_PATH", env) ?? null,
    valTimeoutMs: readInt("PLAN_VERIFIER_VAL_TIMEOUT_MS", DEFAULT_VAL_TIMEOUT_MS, { min: 1 }, env),
    canonicalize: readBool("PLAN_VERIFIER_CANONICALIZE", false, env),
  };
}
