/**
 * Shared types used across the verifier. Grouping these definitions keeps the
 * error codes and failure helpers consistent between the core layers and the
 * tool surface.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Keeping a single source of truth ensures every layer emits consistent codes
 * which simplifies documentation and client handling.
 */
export const ERROR_CATALOG = {
  PLAN: {
    MALFORMED: "E-PLAN-MALFORMED",
    INVALID_INPUT: "E-PLAN-INVALID-INPUT",
    UNEXPECTED: "E-PLAN-UNEXPECTED",
  },
  STRUCT: {
    EMPTY: "E-STRUCT-EMPTY",
    DISCONNECTED: "E-STRUCT-DISCONNECTED",
    CYCLE: "E-STRUCT-CYCLE",
  },
  PHYSICS: {
    VIOLATION: "E-PHYSICS-VIOLATION",
    UNKNOWN_ACTION: "E-PHYSICS-UNKNOWN-ACTION",
    PARSE: "E-PHYSICS-PARSE",
    MAPPING: "E-PHYSICS-MAPPING",
    INVALID_STATE: "E-PHYSICS-INVALID-STATE",
  },
  REPAIR: {
    EXHAUSTED: "E-REPAIR-EXHAUSTED",
    NO_PROGRESS: "E-REPAIR-NO-PROGRESS",
  },
  CHECKER: {
    UNAVAILABLE: "E-CHECKER-UNAVAILABLE",
    TIMEOUT: "E-CHECKER-TIMEOUT",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `STRUCT_CYCLE`).
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.REPAIR_EXHAUSTED`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the verifier. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for tool error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 240;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. Empty text falls back to a generic message.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Normalises the optional hint attached to an error. */
export function normaliseErrorHint(hint?: string): string | undefined {
  if (hint === undefined) {
    return undefined;
  }
  const collapsed = hint.replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) {
    return undefined;
  }
  if (collapsed.length <= ERROR_TEXT_MAX_LENGTH) {
    return collapsed;
  }
  return `${collapsed.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/**
 * Canonical failure payload returned by the tool surface. The structure stays
 * identical regardless of the call site so clients can branch on `code`.
 */
export interface ToolFailure<Code extends string = string> {
  ok: false;
  code: Code;
  message: string;
  hint?: string;
}

/**
 * Builds a {@link ToolFailure} using the canonical error normalisation rules.
 * The hint is removed entirely when it collapses to an empty string.
 */
export function fail<Code extends string>(
  code: Code,
  message: string,
  hint?: string | null,
): ToolFailure<Code> {
  const failure: ToolFailure<Code> = {
    ok: false,
    code,
    message: normaliseErrorMessage(message),
  };
  const normalisedHint = normaliseErrorHint(hint ?? undefined);
  if (normalisedHint) {
    failure.hint = normalisedHint;
  }
  return failure;
}
