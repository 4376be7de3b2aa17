import type { BlocksworldInitialState } from "./blocksworld.js";

/** Pieces of a PDDL problem file that the verifier consumes. */
export interface PddlProblemSummary {
  problem: string | null;
  domain: string | null;
  objects: string[];
  /** Raw `:init` atoms, e.g. `["ontable a", "clear a", "handempty"]`. */
  init: string[];
  initialState: BlocksworldInitialState;
}

/**
 * Returns the body of the first `(<keyword> ...)` section, matching nested
 * parentheses. `null` when the section is missing or unbalanced.
 */
function extractSection(text: string, keyword: string): string | null {
  const pattern = new RegExp(`\\(\\s*${keyword}\\b`, "i");
  const match = pattern.exec(text);
  if (!match) {
    return null;
  }
  let depth = 0;
  for (let index = match.index; index < text.length; index += 1) {
    const char = text[index];
    if (char === "(") {
      depth += 1;
    } else if (char === ")") {
      depth -= 1;
      if (depth === 0) {
        return text.slice(match.index + match[0].length, index);
      }
    }
  }
  return null;
}

function atoms(section: string): string[] {
  const found: string[] = [];
  const pattern = /\(([^()]*)\)/g;
  for (let match = pattern.exec(section); match !== null; match = pattern.exec(section)) {
    const atom = match[1].trim().replace(/\s+/g, " ").toLowerCase();
    if (atom.length > 0) {
      found.push(atom);
    }
  }
  return found;
}

/**
 * Reads the initial blocks-world state out of a PDDL problem text. Recognised
 * atoms are `ontable`, `on`, `clear`, `holding` and `handempty`; anything
 * else stays in {@link PddlProblemSummary.init} but does not affect the state.
 */
export function parseBlocksworldProblem(text: string): PddlProblemSummary {
  const problem = /\(\s*problem\s+([^\s()]+)\s*\)/i.exec(text)?.[1] ?? null;
  const domain = /\(\s*:domain\s+([^\s()]+)\s*\)/i.exec(text)?.[1] ?? null;

  const objectsSection = extractSection(text, ":objects");
  const objects = objectsSection
    ? objectsSection
        .replace(/(^|\s)-\s*\S+/g, " ")
        .split(/\s+/)
        .map((token) => token.trim().toLowerCase())
        .filter((token) => token.length > 0)
    : [];

  const initSection = extractSection(text, ":init");
  const init = initSection ? atoms(initSection) : [];

  const onTable: string[] = [];
  const on: Array<[string, string]> = [];
  const clear: string[] = [];
  let holding: string | null = null;

  for (const atom of init) {
    const [predicate, ...args] = atom.split(" ");
    if (predicate === "ontable" && args.length >= 1) {
      onTable.push(args[0]);
    } else if (predicate === "on" && args.length >= 2) {
      on.push([args[0], args[1]]);
    } else if (predicate === "clear" && args.length >= 1) {
      clear.push(args[0]);
    } else if (predicate === "holding" && args.length >= 1) {
      holding = args[0];
    } else if (predicate === "handempty") {
      holding = null;
    }
  }

  return {
    problem: problem ? problem.toLowerCase() : null,
    domain: domain ? domain.toLowerCase() : null,
    objects,
    init,
    initialState: { on_table: onTable, on, clear, holding },
  };
}
