import { z } from "zod";

import { InvalidWorldStateError, PhysicsViolationError } from "../errors.js";
import { ERROR_CODES, type ErrorCode } from "../types.js";
import { formatAction, parseAction, type ParsedAction } from "./actionParser.js";
import type { DomainSimulator, PhysicsReport } from "./simulator.js";

/** Initial world description, using the predicate names of the problem files. */
export interface BlocksworldInitialState {
  on_table?: readonly string[];
  /** `[upper, lower]` pairs. */
  on?: ReadonlyArray<readonly [string, string]>;
  clear?: readonly string[];
  holding?: string | null;
}

/** Sorted, serialisable view of a {@link WorldState}. */
export interface BlocksworldSnapshot {
  on_table: string[];
  on: Array<[string, string]>;
  clear: string[];
  holding: string | null;
}

const BlockSchema = z.string().trim().min(1, "block name must not be empty").transform((name) => name.toLowerCase());

export const BlocksworldInitialStateSchema = z
  .object({
    on_table: z.array(BlockSchema).default([]),
    on: z.array(z.tuple([BlockSchema, BlockSchema])).default([]),
    clear: z.array(BlockSchema).default([]),
    holding: BlockSchema.nullable().default(null),
  })
  .strict();

/** Block names compare case-insensitively, like action arguments. */
const blockName = (name: string): string => name.trim().toLowerCase();

const pairKey = (upper: string, lower: string): string => JSON.stringify([upper, lower]);

/**
 * Mutable block-stacking state for one simulation run. Each transition checks
 * every precondition before touching the state, so a rejected action leaves
 * the state exactly as it was.
 */
export class WorldState {
  private readonly table = new Set<string>();
  private readonly stacked = new Map<string, readonly [string, string]>();
  private readonly clearBlocks = new Set<string>();
  private held: string | null = null;

  static from(init: BlocksworldInitialState): WorldState {
    const state = new WorldState();
    for (const block of init.on_table ?? []) {
      state.table.add(blockName(block));
    }
    for (const [rawUpper, rawLower] of init.on ?? []) {
      const upper = blockName(rawUpper);
      const lower = blockName(rawLower);
      state.stacked.set(pairKey(upper, lower), [upper, lower]);
    }
    for (const block of init.clear ?? []) {
      state.clearBlocks.add(blockName(block));
    }
    state.held = init.holding ? blockName(init.holding) : null;
    return state;
  }

  get holding(): string | null {
    return this.held;
  }

  isClear(block: string): boolean {
    return this.clearBlocks.has(block);
  }

  isOnTable(block: string): boolean {
    return this.table.has(block);
  }

  isOn(upper: string, lower: string): boolean {
    return this.stacked.has(pairKey(upper, lower));
  }

  pickUp(block: string): void {
    this.require(this.isClear(block), `${block} is not clear`);
    this.require(this.isOnTable(block), `${block} is not on the table`);
    this.requireHandEmpty();
    this.table.delete(block);
    this.clearBlocks.delete(block);
    this.held = block;
  }

  putDown(block: string): void {
    this.require(this.held === block, `hand is not holding ${block}`);
    this.held = null;
    this.table.add(block);
    this.clearBlocks.add(block);
  }

  stack(block: string, onto: string): void {
    this.require(this.held === block, `hand is not holding ${block}`);
    this.require(this.isClear(onto), `${onto} is not clear`);
    this.held = null;
    this.stacked.set(pairKey(block, onto), [block, onto]);
    this.clearBlocks.delete(onto);
    this.clearBlocks.add(block);
  }

  unstack(block: string, from: string): void {
    this.require(this.isOn(block, from), `${block} is not on ${from}`);
    this.require(this.isClear(block), `${block} is not clear`);
    this.requireHandEmpty();
    this.held = block;
    this.stacked.delete(pairKey(block, from));
    this.clearBlocks.add(from);
    this.clearBlocks.delete(block);
  }

  snapshot(): BlocksworldSnapshot {
    return {
      on_table: [...this.table].sort(),
      on: [...this.stacked.values()]
        .map(([upper, lower]): [string, string] => [upper, lower])
        .sort((a, b) => pairKey(a[0], a[1]).localeCompare(pairKey(b[0], b[1]))),
      clear: [...this.clearBlocks].sort(),
      holding: this.held,
    };
  }

  private requireHandEmpty(): void {
    if (this.held !== null) {
      throw new PhysicsViolationError(`hand is not empty (holding ${this.held})`);
    }
  }

  private require(condition: boolean, violated: string): void {
    if (!condition) {
      throw new PhysicsViolationError(violated);
    }
  }
}

type BlocksworldKind = "pick-up" | "put-down" | "stack" | "unstack";

const ARITY: Record<BlocksworldKind, number> = {
  "pick-up": 1,
  "put-down": 1,
  stack: 2,
  unstack: 2,
};

/** Maps spelling variants (`pickup`, `pick_up`, `PICK-UP`) onto the canonical kinds. */
export function normaliseBlocksworldKind(kind: string): BlocksworldKind | null {
  switch (kind.toLowerCase().replace(/[-_\s]/g, "")) {
    case "pickup":
      return "pick-up";
    case "putdown":
      return "put-down";
    case "stack":
      return "stack";
    case "unstack":
      return "unstack";
    default:
      return null;
  }
}

function apply(state: WorldState, kind: BlocksworldKind, action: ParsedAction): void {
  const [x, y] = action.args;
  switch (kind) {
    case "pick-up":
      state.pickUp(x);
      return;
    case "put-down":
      state.putDown(x);
      return;
    case "stack":
      state.stack(x, y);
      return;
    case "unstack":
      state.unstack(x, y);
      return;
  }
}

/**
 * Replays {@link actions} from {@link init} and stops at the first action
 * that cannot be parsed, is unknown, has the wrong arity or violates a
 * precondition. Whether the final state satisfies a goal is not checked.
 */
export function validatePlan(
  actions: readonly string[],
  init: BlocksworldInitialState,
): PhysicsReport<BlocksworldSnapshot> {
  const state = WorldState.from(init);
  const halt = (index: number, code: ErrorCode, message: string): PhysicsReport<BlocksworldSnapshot> => ({
    valid: false,
    errors: [`step ${index}: ${message}`],
    code,
    failedIndex: index,
    appliedCount: index,
    finalState: state.snapshot(),
  });

  for (const [index, text] of actions.entries()) {
    const parsed = parseAction(text);
    if (!parsed.ok) {
      return halt(index, ERROR_CODES.PHYSICS_PARSE, `cannot parse '${text.trim()}': ${parsed.error}`);
    }
    const kind = normaliseBlocksworldKind(parsed.action.kind);
    const rendered = formatAction(parsed.action);
    if (kind === null) {
      return halt(index, ERROR_CODES.PHYSICS_UNKNOWN_ACTION, `unknown action kind '${parsed.action.kind}' in ${rendered}`);
    }
    const expected = ARITY[kind];
    if (parsed.action.args.length !== expected) {
      return halt(index, ERROR_CODES.PHYSICS_PARSE, `${rendered} expects ${expected} argument(s), got ${parsed.action.args.length}`);
    }
    try {
      apply(state, kind, parsed.action);
    } catch (error) {
      if (error instanceof PhysicsViolationError) {
        return halt(index, error.code, `${rendered} violates precondition: ${error.condition}`);
      }
      throw error;
    }
  }

  return { valid: true, errors: [], code: null, failedIndex: null, appliedCount: actions.length, finalState: state.snapshot() };
}

/** Validates an untrusted initial-state description. */
export function parseBlocksworldInitialState(raw: unknown): BlocksworldInitialState {
  const parsed = BlocksworldInitialStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidWorldStateError(
      parsed.error.issues.map((issue) => ({ path: `/${issue.path.join("/")}`, message: issue.message })),
    );
  }
  return parsed.data;
}

export const blocksworldSimulator: DomainSimulator = {
  domain: "blocksworld",
  simulate(actions, initialState) {
    return validatePlan(actions, parseBlocksworldInitialState(initialState));
  },
};
