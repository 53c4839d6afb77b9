import fs from "node:fs";
import path from "node:path";
import type { BatchStatus } from "../types/batch.js";
import type { LifecycleState, Verdict } from "../types/branch.js";
import type { ExcludedMetric, MetricDelta } from "../types/comparison.js";
import type { RegressionReport } from "../types/regression.js";
import { compareMetrics } from "../compare/comparator.js";
import { currentBatch } from "../lifecycle/batches.js";
import { EXIT } from "./exit-codes.js";
import { loadContext, type CommonOptions } from "./context.js";
import { fail, failure, type CommandResult } from "./result.js";

export type ReportMember = {
  branch: string;
  state: LifecycleState;
  verdict: Verdict;
  win_count: number | null;
  run_id: string | null;
  hold: string | null;
  merge_commit: string | null;
  deltas: MetricDelta[];
  excluded: ExcludedMetric[];
};

export type BatchReport = {
  batch: string;
  status: BatchStatus;
  halt_reason: string | null;
  baseline: { id: string; run_id: string; commit: string; metrics: Record<string, number> } | null;
  merge_order: string[];
  members: ReportMember[];
  regressions: RegressionReport[];
  generated_at: string;
};

export type ReportFormat = "markdown" | "json";

export type ReportResult = CommandResult<{ report: BatchReport; rendered: string; output: string | null }>;

function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toPrecision(6).replace(/\.?0+$/, "");
}

function signed(n: number): string {
  return n > 0 ? `+${fmt(n)}` : fmt(n);
}

export function renderMarkdown(report: BatchReport): string {
  const lines: string[] = [`# ${report.batch} (${report.status})`, ""];
  if (report.halt_reason) lines.push(`Halted: ${report.halt_reason}`, "");
  lines.push(
    report.baseline
      ? `Baseline: ${report.baseline.id} (run ${report.baseline.run_id}, commit ${report.baseline.commit})`
      : "Baseline: none",
    "",
  );

  lines.push("| Branch | State | Verdict | Wins | Run |", "|---|---|---|---|---|");
  for (const m of report.members) {
    lines.push(`| ${m.branch} | ${m.state} | ${m.verdict} | ${m.win_count ?? "-"} | ${m.run_id ?? "-"} |`);
  }

  for (const m of report.members) {
    if (m.deltas.length === 0 && m.excluded.length === 0 && !m.hold) continue;
    lines.push("", `## ${m.branch}`, "");
    if (m.hold) lines.push(`On hold: ${m.hold}`, "");
    if (m.deltas.length > 0) {
      lines.push("| Metric | Candidate | Baseline | Delta | Improved |", "|---|---|---|---|---|");
      for (const d of m.deltas) {
        lines.push(`| ${d.metric} | ${fmt(d.candidate)} | ${fmt(d.baseline)} | ${signed(d.delta)} | ${d.improved ? "yes" : "no"} |`);
      }
    }
    for (const ex of m.excluded) lines.push(`- ${ex.metric}: ${ex.reason.replaceAll("_", " ")}`);
  }

  if (report.merge_order.length > 0) lines.push("", `Merge order: ${report.merge_order.join(", ")}`);

  for (const r of report.regressions) {
    lines.push("", `## Regression in ${r.baseline_id} (vs ${r.previous_baseline_id})`, "");
    for (const d of r.regressed) {
      lines.push(`- ${d.metric}: ${fmt(d.baseline)} -> ${fmt(d.candidate)} (${signed(d.delta)})`);
    }
    lines.push(`- merged branches: ${r.merged_branches.join(", ") || "none"}`);
  }
  return lines.join("\n") + "\n";
}

/** Batch report: members, verdicts, deltas against the batch baseline, merge order and regressions. */
export async function report(
  opts: CommonOptions & { batch?: string; format?: ReportFormat; output?: string } = {},
): Promise<ReportResult> {
  try {
    const ctx = loadContext(opts);
    const state = await ctx.store.load(ctx.config.project);
    const batch = opts.batch
      ? state.batches.find((b) => b.id === opts.batch)
      : currentBatch(state) ?? state.batches[state.batches.length - 1];
    if (!batch) {
      return fail("NO_RUNS", opts.batch ? `Batch not found: ${opts.batch}` : "No batches yet", EXIT.NO_RUNS);
    }

    const baseline = state.baselines.find((b) => b.id === batch.baseline_id) ?? null;
    const { primary, directions } = ctx.config.metrics;
    const members: ReportMember[] = [];
    for (const name of batch.members) {
      const branch = state.branches[name];
      if (!branch) continue;
      const run = branch.run_id ? await ctx.registry.getRun(branch.run_id) : null;
      const comparison =
        run && baseline
          ? compareMetrics(run.summary, baseline.metrics, { metrics: primary.length > 0 ? primary : undefined, directions })
          : { deltas: [], excluded: [] };
      members.push({
        branch: name,
        state: branch.state,
        verdict: branch.verdict,
        win_count: branch.win_count,
        run_id: branch.run_id,
        hold: branch.hold,
        merge_commit: branch.merge_commit,
        deltas: comparison.deltas,
        excluded: comparison.excluded,
      });
    }

    const fromBatch = new Set(state.baselines.filter((b) => b.source_batch_id === batch.id).map((b) => b.id));
    const result: BatchReport = {
      batch: batch.id,
      status: batch.status,
      halt_reason: batch.halt_reason,
      baseline: baseline
        ? { id: baseline.id, run_id: baseline.run_id, commit: baseline.commit, metrics: baseline.metrics }
        : null,
      merge_order: batch.merge_order,
      members,
      regressions: state.regressions.filter((r) => fromBatch.has(r.baseline_id)),
      generated_at: ctx.deps.now().toISOString(),
    };

    const rendered = opts.format === "json" ? JSON.stringify(result, null, 2) + "\n" : renderMarkdown(result);
    let output: string | null = null;
    if (opts.output) {
      output = path.resolve(opts.cwd ?? process.cwd(), opts.output);
      fs.mkdirSync(path.dirname(output), { recursive: true });
      fs.writeFileSync(output, rendered, "utf8");
    }
    return { ok: true, report: result, rendered, output };
  } catch (e) {
    return failure(e);
  }
}
