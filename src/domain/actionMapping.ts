import type { ActionNode } from "../plan/model.js";

/**
 * Result of turning one plan node into a grounded action string. `skip` is
 * used for nodes that carry no domain action (virtual START/END markers).
 */
export type ActionMapping =
  | { status: "mapped"; action: string }
  | { status: "skip" }
  | { status: "error"; message: string };

/** Per-domain strategy converting plan nodes into `(kind arg ...)` strings. */
export type ActionStringMapper = (node: ActionNode) => ActionMapping;

/** Lower-cases and drops the `block ` prefix planners sometimes emit. */
export function normaliseParamValue(value: string | undefined): string {
  if (!value) {
    return "";
  }
  const trimmed = value.trim().toLowerCase();
  return trimmed.startsWith("block ") ? trimmed.slice("block ".length).trim() : trimmed;
}

/**
 * Returns the first non-empty parameter among {@link keys}, falling back to
 * the value found at {@link position} in declaration order.
 */
export function pickParam(
  params: Readonly<Record<string, string>>,
  keys: readonly string[],
  position: number,
): string {
  for (const key of keys) {
    const value = normaliseParamValue(params[key]);
    if (value) {
      return value;
    }
  }
  return normaliseParamValue(Object.values(params)[position]);
}

/** Collapses separators so `PickUp`, `pick_up` and `pick-up` compare equal. */
export function compactKind(kind: string): string {
  return kind.toLowerCase().replace(/[-_\s]/g, "");
}

const BLOCK_KEYS = ["block", "object", "obj", "x", "top"];
const TARGET_KEYS = ["target", "y", "to", "on", "onto", "from", "bottom", "underneath"];

/** Mapper for the block-stacking domain. */
export const blocksworldActionMapper: ActionStringMapper = (node) => {
  const kind = compactKind(node.kind);
  if (kind === "virtual") {
    return { status: "skip" };
  }
  const block = pickParam(node.params, BLOCK_KEYS, 0);
  const target = pickParam(node.params, TARGET_KEYS, 1);

  const single = (name: string): ActionMapping =>
    block ? { status: "mapped", action: `(${name} ${block})` } : missing(node, "block");
  const pair = (name: string): ActionMapping => {
    if (!block) {
      return missing(node, "block");
    }
    return target ? { status: "mapped", action: `(${name} ${block} ${target})` } : missing(node, "target");
  };

  switch (kind) {
    case "pickup":
      return single("pick-up");
    case "putdown":
      return single("put-down");
    case "stack":
      return pair("stack");
    case "unstack":
      return pair("unstack");
    default:
      // Unknown kinds are passed through; the simulator reports them.
      return {
        status: "mapped",
        action: `(${[node.kind.trim().toLowerCase(), ...Object.values(node.params).map(normaliseParamValue)].join(" ")})`,
      };
  }
};

interface LogisticsSignature {
  name: string;
  slots: ReadonlyArray<readonly string[]>;
}

const LOGISTICS: Record<string, LogisticsSignature> = {
  loadtruck: { name: "load-truck", slots: [["obj", "object", "package", "pkg"], ["truck", "vehicle"], ["loc", "location", "at", "place"]] },
  unloadtruck: { name: "unload-truck", slots: [["obj", "object", "package", "pkg"], ["truck", "vehicle"], ["loc", "location", "at", "place"]] },
  loadairplane: { name: "load-airplane", slots: [["obj", "object", "package", "pkg"], ["airplane", "plane"], ["loc", "location", "at", "place"]] },
  unloadairplane: { name: "unload-airplane", slots: [["obj", "object", "package", "pkg"], ["airplane", "plane"], ["loc", "location", "at", "place"]] },
  drivetruck: { name: "drive-truck", slots: [["truck", "vehicle"], ["from", "source", "origin"], ["to", "dest", "destination"], ["city"]] },
  flyairplane: { name: "fly-airplane", slots: [["airplane", "plane"], ["from", "source", "origin"], ["to", "dest", "destination"]] },
};

/** Mapper for the logistics domain (trucks, airplanes, packages). */
export const logisticsActionMapper: ActionStringMapper = (node) => {
  const kind = compactKind(node.kind);
  if (kind === "virtual") {
    return { status: "skip" };
  }
  const signature = LOGISTICS[kind];
  if (!signature) {
    return { status: "error", message: `node '${node.id}': unsupported logistics action '${node.kind}'` };
  }
  const args = signature.slots.map((keys, position) => pickParam(node.params, keys, position));
  const missingSlot = args.findIndex((value) => value.length === 0);
  if (missingSlot >= 0) {
    return missing(node, signature.slots[missingSlot][0]);
  }
  return { status: "mapped", action: `(${[signature.name, ...args].join(" ")})` };
};

function missing(node: ActionNode, slot: string): ActionMapping {
  return { status: "error", message: `node '${node.id}' (${node.kind}) is missing parameter '${slot}'` };
}
