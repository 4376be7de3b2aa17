#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { loadVerifierSettings } from "./config/settings.js";
import { StructuredLogger } from "./logger.js";
import { createPlanVerifierServer } from "./server/tools.js";

/**
 * Starts the verifier over stdio. Log lines go to the file mirror only, since
 * stdout carries the MCP protocol.
 */
async function main(): Promise<void> {
  const settings = loadVerifierSettings();
  const logger = new StructuredLogger({
    logFile: settings.logFile,
    minLevel: settings.logLevel,
    redactionEnabled: settings.logRedaction,
    silent: true,
  });
  const server = createPlanVerifierServer({ settings, logger });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("stdio_listening", {
    max_attempts: settings.maxStructuralAttempts,
    symbolic_checker: settings.valPath !== null,
  });

  process.on("SIGINT", () => {
    logger.warn("shutdown_signal", { signal: "SIGINT" });
    server
      .close()
      .then(() => logger.flush())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
      });
  });
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  });
}
