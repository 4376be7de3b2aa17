import { spawn as nodeSpawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Readable } from "node:stream";

import { ExternalCheckerUnavailableError } from "../errors.js";
import type { ExternalCheckRequest, ExternalCheckVerdict, ExternalChecker } from "./external.js";

/** Default upper bound on a single validator run. */
export const DEFAULT_VAL_TIMEOUT_MS = 30_000;

/** Subset of {@link import("node:child_process").ChildProcess} the checker relies on. */
export interface CheckerProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnCheckerProcess = (command: string, args: readonly string[]) => CheckerProcess;

export interface ValCheckerOptions {
  /** Path to the `validate` executable. */
  executable: string;
  timeoutMs?: number;
  /** Test seam replacing {@link nodeSpawn}. */
  spawnImpl?: SpawnCheckerProcess;
  /** Directory receiving the temporary plan files (defaults to the OS temp dir). */
  tempRoot?: string;
}

const defaultSpawn: SpawnCheckerProcess = (command, args) =>
  nodeSpawn(command, [...args], { stdio: ["ignore", "pipe", "pipe"], shell: false });

/**
 * Checker backed by the VAL plan validator. Each call writes the domain,
 * problem and plan to a private temporary directory, runs `validate -v`, and
 * removes the directory afterwards.
 */
export function createValChecker(options: ValCheckerOptions): ExternalChecker {
  const timeoutMs = options.timeoutMs ?? DEFAULT_VAL_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error("timeoutMs must be a positive finite number");
  }
  const spawnImpl = options.spawnImpl ?? defaultSpawn;

  return {
    name: "val",
    async check(request: ExternalCheckRequest): Promise<ExternalCheckVerdict> {
      if (request.actions.length === 0) {
        return { valid: false, errors: ["empty plan: no actions to verify"] };
      }
      const directory = await mkdtemp(join(options.tempRoot ?? tmpdir(), "plan-verifier-"));
      try {
        const domainFile = join(directory, "domain.pddl");
        const problemFile = join(directory, "problem.pddl");
        const planFile = join(directory, "plan.pddl");
        await writeFile(domainFile, request.domainText, "utf8");
        await writeFile(problemFile, request.problemText, "utf8");
        await writeFile(planFile, renderPlanFile(request.actions), "utf8");

        const output = await runProcess(
          spawnImpl,
          options.executable,
          ["-v", domainFile, problemFile, planFile],
          timeoutMs,
        );
        return parseValOutput(output);
      } finally {
        await rm(directory, { recursive: true, force: true });
      }
    },
  };
}

/** One action per line, each wrapped in parentheses. */
export function renderPlanFile(actions: readonly string[]): string {
  return actions
    .map((action) => {
      const trimmed = action.trim();
      return trimmed.startsWith("(") ? trimmed : `(${trimmed})`;
    })
    .map((line) => `${line}\n`)
    .join("");
}

function runProcess(
  spawnImpl: SpawnCheckerProcess,
  command: string,
  args: readonly string[],
  timeoutMs: number,
): Promise<string> {
  return new Promise((resolve, reject) => {
    let child: CheckerProcess;
    try {
      child = spawnImpl(command, args);
    } catch (error) {
      reject(toUnavailable(command, error));
      return;
    }

    const stdout: string[] = [];
    const stderr: string[] = [];
    child.stdout?.on("data", (chunk: Buffer | string) => stdout.push(chunk.toString()));
    child.stderr?.on("data", (chunk: Buffer | string) => stderr.push(chunk.toString()));

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);
    timer.unref();

    child.once("error", (error: unknown) => {
      clearTimeout(timer);
      reject(toUnavailable(command, error));
    });
    child.once("close", () => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new ExternalCheckerUnavailableError(`validator timed out after ${timeoutMs}ms`, { timedOut: true }));
        return;
      }
      resolve(stdout.join("") + stderr.join(""));
    });
  });
}

function toUnavailable(command: string, error: unknown): ExternalCheckerUnavailableError {
  const code = error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;
  switch (code) {
    case "ENOENT":
      return new ExternalCheckerUnavailableError(`validator executable not found: ${command}`, { cause: error });
    case "ENOEXEC":
    case "EACCES":
      return new ExternalCheckerUnavailableError(
        `validator executable cannot run on this platform (${code}): ${command}`,
        { cause: error },
      );
    default: {
      const message = error instanceof Error ? error.message : String(error);
      return new ExternalCheckerUnavailableError(`validator failed to start: ${message}`, { cause: error });
    }
  }
}

/**
 * Interprets the verbose output of VAL. The plan is valid only when it
 * executed and no goal failure was reported; every other outcome yields the
 * most specific messages that can be extracted.
 */
export function parseValOutput(output: string): ExternalCheckVerdict {
  const executed = output.includes("Plan executed successfully");
  const goalFailed = output.includes("Goal not satisfied") || output.includes("Plan invalid");
  if (executed && !goalFailed) {
    return { valid: true, errors: [] };
  }

  const recognised =
    goalFailed ||
    output.includes("Plan failed") ||
    output.includes("Bad plan") ||
    output.includes("Error in type-checking") ||
    output.includes("Bad problem file");
  if (!recognised) {
    return { valid: false, errors: ["validator result unclear"] };
  }
  return { valid: false, errors: extractValErrors(output) };
}

function extractValErrors(output: string): string[] {
  const errors: string[] = [];

  const precondition = /Plan failed because of unsatisfied precondition in:\s*\n\s*(\(.+?\))/s.exec(output);
  if (precondition) {
    errors.push(`unsatisfied precondition in action: ${precondition[1].trim()}`);
  }

  const advice = /Plan Repair Advice:\s*\n(.*?)(?:\n\s*\n|\nFailed plans:|$)/s.exec(output);
  if (advice) {
    errors.push(`repair advice: ${advice[1].trim()}`);
  }

  if (output.includes("Goal not satisfied")) {
    errors.push("plan executed but goal not satisfied");
  }

  for (const match of output.matchAll(/Precondition not satisfied: (.+)/g)) {
    errors.push(`precondition violation: ${match[1].trim()}`);
  }

  if (output.includes("Error in type-checking")) {
    errors.push("type-checking error: action parameters have invalid types");
  }

  for (const match of output.matchAll(/Invalid action: (.+)/g)) {
    errors.push(`invalid action: ${match[1].trim()}`);
  }

  if (errors.length === 0) {
    const line = output.split("\n").find((candidate) => /error|fail/i.test(candidate));
    errors.push(line ? line.trim() : "plan validation failed (reason unclear)");
  }
  return errors;
}
