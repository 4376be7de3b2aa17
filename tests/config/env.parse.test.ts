/**
 * Table-driven tests covering the environment parsing helpers.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { readBool, readEnum, readInt, readOptionalBool, readOptionalInt, readOptionalString } from "../../src/config/env.js";

describe("config/env helpers", () => {
  it("recognises boolean literals case-insensitively", () => {
    const cases: Array<[string | undefined, boolean | undefined]> = [
      ["1", true],
      ["YES", true],
      [" on ", true],
      ["false", false],
      ["Off", false],
      ["maybe", undefined],
      ["", undefined],
      [undefined, undefined],
    ];
    for (const [raw, expected] of cases) {
      expect(readOptionalBool("FLAG", { FLAG: raw }), `literal ${String(raw)}`).to.equal(expected);
    }
    expect(readBool("FLAG", true, { FLAG: "maybe" })).to.equal(true);
  });

  it("parses integers within bounds and falls back otherwise", () => {
    expect(readOptionalInt("N", undefined, { N: "42" })).to.equal(42);
    expect(readOptionalInt("N", undefined, { N: "+7" })).to.equal(7);
    expect(readOptionalInt("N", undefined, { N: "4.5" })).to.equal(undefined);
    expect(readOptionalInt("N", undefined, { N: "99999999999999999999" })).to.equal(undefined);
    expect(readInt("N", 3, { min: 1, max: 10 }, { N: "0" })).to.equal(3);
    expect(readInt("N", 3, { min: 1, max: 10 }, { N: "10" })).to.equal(10);
  });

  it("treats blank strings as unset", () => {
    expect(readOptionalString("S", { S: "  /usr/bin/validate " })).to.equal("/usr/bin/validate");
    expect(readOptionalString("S", { S: "   " })).to.equal(undefined);
  });

  it("matches enum values case-insensitively", () => {
    const levels = ["debug", "info", "warn"] as const;
    expect(readEnum("L", levels, "info", { L: "WARN" })).to.equal("warn");
    expect(readEnum("L", levels, "info", { L: "verbose" })).to.equal("info");
    expect(readEnum("L", levels, "info", {})).to.equal("info");
  });
});
