/**
 * Parser for the canonical textual form of a grounded action:
 *
 * ```
 * action := "(" kind { arg } ")" | kind { arg }
 * kind   := letter { letter | digit | "-" | "_" }
 * arg    := 1*( letter | digit | "-" | "_" | "." )
 * ```
 *
 * Tokens are separated by whitespace and lower-cased. Anything else is
 * rejected with a message rather than guessed at.
 */

/** Structured form of `(kind arg1 arg2 ...)`. */
export interface ParsedAction {
  readonly kind: string;
  readonly args: readonly string[];
}

export type ActionParseResult =
  | { ok: true; action: ParsedAction }
  | { ok: false; error: string };

const KIND_PATTERN = /^[a-z][a-z0-9_-]*$/;
const ARG_PATTERN = /^[a-z0-9_.-]+$/;

export function parseAction(text: string): ActionParseResult {
  let body = text.trim();
  if (body.startsWith("(") || body.endsWith(")")) {
    if (!(body.startsWith("(") && body.endsWith(")"))) {
      return { ok: false, error: `unbalanced parentheses in '${text.trim()}'` };
    }
    body = body.slice(1, -1).trim();
  }
  if (body.length === 0) {
    return { ok: false, error: "empty action" };
  }

  const tokens = body.toLowerCase().split(/\s+/);
  const [kind, ...args] = tokens;
  if (!KIND_PATTERN.test(kind)) {
    return { ok: false, error: `invalid action kind '${kind}'` };
  }
  const badArg = args.find((arg) => !ARG_PATTERN.test(arg));
  if (badArg !== undefined) {
    return { ok: false, error: `invalid argument '${badArg}' in '${text.trim()}'` };
  }
  return { ok: true, action: { kind, args } };
}

/** Renders an action back into its canonical `(kind arg ...)` form. */
export function formatAction(action: ParsedAction): string {
  return `(${[action.kind, ...action.args].join(" ")})`;
}
