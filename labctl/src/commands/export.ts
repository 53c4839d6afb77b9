import fs from "node:fs";
import path from "node:path";
import type { Run } from "../types/run.js";
import { createLogger } from "../logging/logger.js";
import { EXIT } from "./exit-codes.js";
import { loadContext, type CommonOptions } from "./context.js";
import { fail, failure, type CommandResult } from "./result.js";

const log = createLogger("export");

export type ExportResult = CommandResult<{ output: string; rows: number; columns: string[] }>;

const FIXED_COLUMNS = ["run_name", "run_id", "branch"] as const;

function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replaceAll('"', '""')}"` : s;
}

/**
 * Metric columns: the requested ones in the order given, keeping only those some
 * run reports; otherwise every reported metric, sorted.
 */
export function exportColumns(runs: Run[], metrics?: string[]): string[] {
  const reported = new Set(runs.flatMap((r) => Object.keys(r.summary)));
  if (metrics && metrics.length > 0) return metrics.filter((m) => reported.has(m));
  return [...reported].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/** CSV of finished runs, newest first. Metrics a run lacks are left empty. */
export function toCsv(runs: Run[], metrics: string[]): string {
  const lines = [[...FIXED_COLUMNS, ...metrics].map(csvField).join(",")];
  for (const run of runs) {
    const fields: Array<string | number> = [run.name, run.id, run.branch ?? "N/A"];
    for (const m of metrics) fields.push(run.summary[m] ?? "");
    lines.push(fields.map(csvField).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}

export async function exportRuns(
  opts: CommonOptions & { output?: string; metrics?: string[] } = {},
): Promise<ExportResult> {
  try {
    const ctx = loadContext(opts);
    const runs = (await ctx.registry.listRuns({ state: "finished" })).sort((a, b) =>
      a.created_at < b.created_at ? 1 : a.created_at > b.created_at ? -1 : 0,
    );
    if (runs.length === 0) return fail("NO_RUNS", "No finished runs found", EXIT.NO_RUNS);

    const columns = exportColumns(runs, opts.metrics);
    const output = path.resolve(opts.cwd ?? process.cwd(), opts.output ?? "results.csv");
    fs.mkdirSync(path.dirname(output), { recursive: true });
    fs.writeFileSync(output, toCsv(runs, columns), "utf8");
    log.info({ output, rows: runs.length }, "exported");
    return { ok: true, output, rows: runs.length, columns };
  } catch (e) {
    return failure(e);
  }
}
