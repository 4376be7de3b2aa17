import { blocksworldSimulator } from "../sim/blocksworld.js";
import type { DomainSimulator } from "../sim/simulator.js";
import { blocksworldActionMapper, logisticsActionMapper, type ActionStringMapper } from "./actionMapping.js";

/**
 * What the orchestrator knows about a planning domain: how to render nodes as
 * action strings and, when available, how to simulate them.
 */
export interface DomainProfile {
  readonly name: string;
  readonly mapper: ActionStringMapper;
  readonly simulator: DomainSimulator | null;
}

const BUILTIN_PROFILES: readonly DomainProfile[] = [
  { name: "blocksworld", mapper: blocksworldActionMapper, simulator: blocksworldSimulator },
  { name: "logistics", mapper: logisticsActionMapper, simulator: null },
];

/** Lookup table of domain profiles keyed by lower-case name. */
export class DomainRegistry {
  private readonly profiles = new Map<string, DomainProfile>();

  constructor(profiles: readonly DomainProfile[] = BUILTIN_PROFILES) {
    for (const profile of profiles) {
      this.register(profile);
    }
  }

  /** Registers (or overrides) a profile. */
  register(profile: DomainProfile): void {
    if (profile.name.trim().length === 0) {
      throw new Error("domain name must be a non-empty string");
    }
    this.profiles.set(profile.name.trim().toLowerCase(), profile);
  }

  resolve(domain: string): DomainProfile | null {
    return this.profiles.get(domain.trim().toLowerCase()) ?? null;
  }

  names(): string[] {
    return [...this.profiles.keys()].sort();
  }
}

/** Registry holding the built-in blocksworld and logistics profiles. */
export const defaultDomainRegistry = new DomainRegistry();

export function resolveDomainProfile(domain: string): DomainProfile | null {
  return defaultDomainRegistry.resolve(domain);
}
