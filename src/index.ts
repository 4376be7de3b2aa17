export * from "./errors.js";
export * from "./types.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { loadVerifierSettings, type VerifierSettings } from "./config/settings.js";

export { Plan, parsePlan, PlanPayloadSchema, type ActionNode, type DependencyEdge, type PlanInit, type PlanPayload } from "./plan/model.js";
export { PlanGraph, buildGraph, type PlanVertex } from "./plan/graph.js";
export { detectCycles, type CycleDetectionResult } from "./plan/algorithms/cycles.js";
export { weaklyConnectedComponents } from "./plan/algorithms/components.js";
export { topologicalOrder } from "./plan/algorithms/topological.js";

export * from "./verify/structural.js";
export * from "./verify/orchestrator.js";

export * from "./sim/actionParser.js";
export * from "./sim/simulator.js";
export * from "./sim/blocksworld.js";
export * from "./sim/pddlProblem.js";

export * from "./domain/actionMapping.js";
export * from "./domain/registry.js";

export * from "./repair/repair.js";
export * from "./repair/canonicalize.js";

export * from "./checker/external.js";
export * from "./checker/val.js";

export { createPlanVerifierServer, summariseVerification, type PlanVerifierServerOptions, type VerificationSummary } from "./server/tools.js";
