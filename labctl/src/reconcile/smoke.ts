import { execFile } from "node:child_process";
import { promisify } from "node:util";
import fs from "node:fs";
import path from "node:path";
import type { SmokeConfig } from "../types/config.js";
import { parseJunitXmlFile, type TestResult } from "./junit-xml.js";

const pExecFile = promisify(execFile);

export type SmokeResult = {
  pass: boolean;
  skipped: boolean;
  output: string;
  tests: TestResult | null;
};

export type ShellRunner = (
  command: string,
  opts: { cwd: string; timeout: number },
) => Promise<{ stdout: string; stderr: string }>;

const shell: ShellRunner = (command, opts) => pExecFile("/bin/sh", ["-c", command], opts);

function processOutput(e: unknown): string {
  if (e instanceof Error) {
    const parts = [e.message];
    if ("stdout" in e && typeof e.stdout === "string") parts.push(e.stdout);
    if ("stderr" in e && typeof e.stderr === "string") parts.push(e.stderr);
    return parts.filter((p) => p.length > 0).join("\n");
  }
  return String(e);
}

/**
 * Smoke-check the trunk working tree: the configured command must exit 0 and,
 * when a JUnit report is configured, report no failures.
 */
export async function runSmokeCheck(config: SmokeConfig, cwd: string, run: ShellRunner = shell): Promise<SmokeResult> {
  if (!config.command) {
    return { pass: true, skipped: true, output: "", tests: null };
  }

  // A report left by an earlier run must not pass for this one.
  const report = config.junit_report ? path.resolve(cwd, config.junit_report) : null;
  if (report) fs.rmSync(report, { force: true });

  let pass = true;
  let output: string;
  try {
    const { stdout, stderr } = await run(config.command, { cwd, timeout: config.timeout_ms });
    output = [stdout, stderr].filter((s) => s.length > 0).join("\n");
  } catch (e) {
    pass = false;
    output = processOutput(e);
  }

  let tests: TestResult | null = null;
  if (report && config.junit_report) {
    if (fs.existsSync(report)) {
      tests = parseJunitXmlFile(report);
      if (!tests.pass) {
        pass = false;
        const names = tests.failures.map((f) => `${f.name}: ${f.message}`);
        output = [output, ...names].filter((s) => s.length > 0).join("\n");
      }
    } else if (pass) {
      pass = false;
      output = [output, `JUnit report not found: ${config.junit_report}`].filter((s) => s.length > 0).join("\n");
    }
  }

  return { pass, skipped: false, output, tests };
}
