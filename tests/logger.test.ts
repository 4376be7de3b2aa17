import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

describe("StructuredLogger", () => {
  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "verifier.log");

    try {
      const logger = new StructuredLogger({
        logFile,
        maxFileSizeBytes: 256,
        maxFileCount: 3,
        silent: true,
      });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }

      await logger.flush();

      const files = await readdir(directory);
      expect(files).to.include("verifier.log");
      expect(files).to.include("verifier.log.1");
      expect(files).to.not.include("verifier.log.3");

      const archived = await readFile(path.join(directory, "verifier.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("redacts values stored under secret-looking keys", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ silent: true, onEntry: (entry) => entries.push(entry) });

    logger.info("checker_configured", { executable: "validate", nested: { token: "test-secret" } });

    expect(entries).to.have.length(1);
    expect(entries[0].payload).to.deep.equal({ executable: "validate", nested: { token: "[REDACTED]" } });
  });

  it("drops entries below the minimum level", () => {
    const messages: string[] = [];
    const logger = new StructuredLogger({
      silent: true,
      minLevel: "warn",
      onEntry: (entry) => messages.push(`${entry.level}:${entry.message}`),
    });

    logger.debug("plan_structure_checked");
    logger.info("plan_verify_started");
    logger.warn("plan_repair_exhausted");
    logger.error("plan_verify_failed");

    expect(messages).to.deep.equal(["warn:plan_repair_exhausted", "error:plan_verify_failed"]);
  });

  it("omits file mirroring when callers pass a null logFile override", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    try {
      const entries: Array<{ message: string }> = [];
      const logger = new StructuredLogger({
        logFile: null,
        silent: true,
        onEntry: (entry) => entries.push({ message: entry.message }),
      });

      logger.warn("null_logfile_sanitised", { detail: "capture" });
      await logger.flush();

      const files = await readdir(directory);
      expect(files.length, "the logger should not create files when mirroring is disabled").to.equal(0);
      expect(entries.map((entry) => entry.message)).to.deep.equal(["null_logfile_sanitised"]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("writes JSON lines in emission order to the mirror file", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "nested", "verifier.log");
    try {
      const logger = new StructuredLogger({ logFile, silent: true });
      logger.info("first", { step: 1 });
      logger.info("second", { step: 2 });
      await logger.flush();

      const lines = (await readFile(logFile, "utf8")).trim().split("\n");
      const parsed: unknown[] = lines.map((line) => JSON.parse(line));
      expect(parsed).to.have.length(2);
      expect(parsed[0]).to.include({ level: "info", message: "first" });
      expect(parsed[1]).to.include({ level: "info", message: "second" });
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
