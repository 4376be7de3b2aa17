import { describe, it } from "mocha";
import { expect } from "chai";

import { DomainRegistry, defaultDomainRegistry, resolveDomainProfile } from "../../src/domain/registry.js";
import { blocksworldSimulator } from "../../src/sim/blocksworld.js";

describe("domain registry", () => {
  it("resolves the built-in profiles case-insensitively", () => {
    expect(resolveDomainProfile(" BlocksWorld ")?.simulator).to.equal(blocksworldSimulator);
    expect(resolveDomainProfile("logistics")?.simulator).to.equal(null);
    expect(resolveDomainProfile("gripper")).to.equal(null);
    expect(defaultDomainRegistry.names()).to.deep.equal(["blocksworld", "logistics"]);
  });

  it("registers custom profiles", () => {
    const registry = new DomainRegistry([]);
    registry.register({ name: "Gripper", mapper: () => ({ status: "skip" }), simulator: null });
    expect(registry.names()).to.deep.equal(["gripper"]);
    expect(registry.resolve("gripper")?.name).to.equal("Gripper");
    expect(() => registry.register({ name: " ", mapper: () => ({ status: "skip" }), simulator: null })).to.throw(
      "domain name must be a non-empty string",
    );
  });
});
