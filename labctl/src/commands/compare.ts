import type { ExcludedMetric, MetricDelta, MetricDirection } from "../types/comparison.js";
import type { RunState } from "../types/run.js";
import { compareMetrics } from "../compare/comparator.js";
import { rankBatch } from "../verdict/verdict-engine.js";
import { EXIT } from "./exit-codes.js";
import { loadContext, type CommonOptions } from "./context.js";
import { fail, failure, type CommandResult } from "./result.js";
import { resolveRun } from "./runs.js";
import { latestByBranch } from "./status.js";

export type BranchComparison = {
  branch: string;
  run_id: string;
  run_state: RunState;
  deltas: MetricDelta[];
  excluded: ExcludedMetric[];
  win_count: number | null;
};

export type CompareBaseline = {
  id: string | null;
  run_id: string;
  metrics: Record<string, number>;
};

export type CompareResult = CommandResult<{
  baseline: CompareBaseline | null;
  comparisons: BranchComparison[];
  /** Metrics the win counts were tallied over. */
  ranked_metrics: string[];
  ambiguous: boolean;
  ambiguous_reasons: string[];
}>;

export type CompareOptions = CommonOptions & {
  branches?: string[];
  /** Run id to compare against instead of the active baseline. */
  baseline?: string;
  metrics?: string[];
  directions?: Record<string, MetricDirection>;
};

/** Per-branch deltas against the baseline, and win counts across the branches. */
export async function compare(opts: CompareOptions = {}): Promise<CompareResult> {
  try {
    const ctx = loadContext(opts);
    const state = await ctx.store.load(ctx.config.project);
    const metrics = opts.metrics ?? (ctx.config.metrics.primary.length > 0 ? ctx.config.metrics.primary : undefined);
    const directions = { ...ctx.config.metrics.directions, ...opts.directions };

    let baseline: CompareBaseline | null = null;
    if (opts.baseline) {
      const run = await ctx.registry.getRun(opts.baseline);
      if (!run) return fail("NO_RUNS", `Baseline run not found: ${opts.baseline}`, EXIT.NO_RUNS);
      baseline = { id: null, run_id: run.id, metrics: run.summary };
    } else {
      const active = state.baselines.find((b) => b.id === state.active_baseline_id);
      if (active) baseline = { id: active.id, run_id: active.run_id, metrics: active.metrics };
    }

    let names = opts.branches;
    if (!names || names.length === 0) {
      names = Object.values(state.branches)
        .filter((b) => b.run_id !== null && b.state !== "archived")
        .map((b) => b.name);
      if (names.length === 0) names = [...latestByBranch(await ctx.registry.listRuns()).keys()];
    }

    const comparisons: BranchComparison[] = [];
    const reasons: string[] = [];
    const summaries = new Map<string, Record<string, number>>();
    for (const name of [...names].sort()) {
      const resolved = await resolveRun(ctx, state, name);
      if (!resolved) {
        reasons.push(`${name}: no runs`);
        continue;
      }
      const { run } = resolved;
      summaries.set(name, run.summary);
      const result = baseline
        ? compareMetrics(run.summary, baseline.metrics, { metrics, directions })
        : { deltas: [], excluded: [] };
      comparisons.push({
        branch: name,
        run_id: run.id,
        run_state: run.state,
        deltas: result.deltas,
        excluded: result.excluded,
        win_count: null,
      });
      if (baseline) {
        for (const ex of result.excluded) reasons.push(`${name}: ${ex.metric} ${ex.reason.replaceAll("_", " ")}`);
        if (result.deltas.length === 0) reasons.push(`${name}: no comparable metrics`);
      }
    }

    if (comparisons.length === 0) return fail("NO_RUNS", "No runs found", EXIT.NO_RUNS);

    let rankedMetrics: string[] = [];
    if (comparisons.length > 1) {
      const contenders = comparisons.map((c) => ({ name: c.branch, metrics: summaries.get(c.branch) ?? {} }));
      const ranking = rankBatch(contenders, { primary: metrics, directions });
      rankedMetrics = ranking.metrics;
      for (const c of comparisons) c.win_count = ranking.winCounts[c.branch] ?? 0;
    }
    if (!baseline && comparisons.length === 1) reasons.push("no baseline to compare against");

    return {
      ok: true,
      baseline,
      comparisons,
      ranked_metrics: rankedMetrics,
      ambiguous: reasons.length > 0,
      ambiguous_reasons: reasons,
    };
  } catch (e) {
    return failure(e);
  }
}
