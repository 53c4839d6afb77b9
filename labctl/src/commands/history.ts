import type { HistoryStep, RunState } from "../types/run.js";
import { matchesMetric } from "../compare/direction.js";
import { EXIT } from "./exit-codes.js";
import { loadContext, type CommonOptions } from "./context.js";
import { fail, failure, type CommandResult } from "./result.js";
import { resolveRun } from "./runs.js";

export type HistoryResult = CommandResult<{
  branch: string;
  run_id: string;
  run_state: RunState;
  metrics: string[];
  total_steps: number;
  steps: HistoryStep[];
}>;

/** Keep `samples` evenly spaced steps, always including the first and last. */
export function sampleSteps(steps: HistoryStep[], samples?: number): HistoryStep[] {
  if (!samples || samples >= steps.length) return steps;
  if (samples === 1) return steps.slice(-1);
  const picked = new Set<number>();
  for (let i = 0; i < samples; i++) {
    picked.add(Math.round((i * (steps.length - 1)) / (samples - 1)));
  }
  return [...picked].sort((a, b) => a - b).map((i) => steps[i]);
}

export function filterHistory(steps: HistoryStep[], metrics?: string[]): HistoryStep[] {
  if (!metrics || metrics.length === 0) return steps;
  return steps
    .map((s) => ({
      step: s.step,
      values: Object.fromEntries(
        Object.entries(s.values).filter(([k]) => metrics.some((entry) => matchesMetric(k, entry))),
      ),
    }))
    .filter((s) => Object.keys(s.values).length > 0);
}

/** Metric history of a branch's run. */
export async function history(
  opts: CommonOptions & { branch: string; metrics?: string[]; samples?: number },
): Promise<HistoryResult> {
  try {
    const ctx = loadContext(opts);
    const state = await ctx.store.load(ctx.config.project);
    const resolved = await resolveRun(ctx, state, opts.branch, { history: true });
    if (!resolved) return fail("NO_RUNS", `No runs found for branch ${opts.branch}`, EXIT.NO_RUNS);

    const steps = filterHistory(resolved.history ?? [], opts.metrics);
    const metrics = [...new Set(steps.flatMap((s) => Object.keys(s.values)))].sort();
    return {
      ok: true,
      branch: opts.branch,
      run_id: resolved.run.id,
      run_state: resolved.run.state,
      metrics,
      total_steps: steps.length,
      steps: sampleSteps(steps, opts.samples),
    };
  } catch (e) {
    return failure(e);
  }
}
