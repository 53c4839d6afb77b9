import type { HistoryStep, RunState, Scalar } from "../types/run.js";
import { classifyDirection, type DirectionOverrides } from "../compare/direction.js";
import { checkHyperparameters, type HyperparameterCheck } from "../config/hyperparameters.js";
import { EXIT } from "./exit-codes.js";
import { loadContext, type CommonOptions } from "./context.js";
import { fail, failure, type CommandResult } from "./result.js";
import { resolveRun } from "./runs.js";

export type DiagnoseResult = CommandResult<{
  branch: string;
  run_id: string;
  run_state: RunState;
  /** Whether the run is on the fix/retry path. */
  failed: boolean;
  log_tail: string[];
  log_errors: string[];
  config: Record<string, Scalar>;
  config_check: HyperparameterCheck;
  anomalies: string[];
  retries_left: number | null;
}>;

const ERROR_LINE = /error|exception|traceback|out of memory|killed|\bnan\b/i;
/** A lower-is-better metric ending this many times above its best value has diverged. */
const DIVERGENCE_FACTOR = 10;

export function logErrors(lines: string[]): string[] {
  return lines.filter((line) => ERROR_LINE.test(line));
}

/** Problems visible in a run's metric history. */
export function historyAnomalies(steps: HistoryStep[], directions?: DirectionOverrides): string[] {
  if (steps.length === 0) return ["no metric history logged"];

  const lastStep = steps[steps.length - 1].step;
  const seen = new Map<string, { lastStep: number; last: number; best: number }>();
  for (const s of steps) {
    for (const [metric, value] of Object.entries(s.values)) {
      const prev = seen.get(metric);
      seen.set(metric, {
        lastStep: s.step,
        last: value,
        best: prev ? Math.min(prev.best, value) : value,
      });
    }
  }

  const anomalies: string[] = [];
  for (const [metric, m] of [...seen.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (m.lastStep < lastStep) anomalies.push(`${metric} stopped reporting after step ${m.lastStep}`);
    if (classifyDirection(metric, directions) === "lower" && m.best > 0 && m.last > m.best * DIVERGENCE_FACTOR) {
      anomalies.push(`${metric} diverged: ${m.last} at step ${m.lastStep}, best ${m.best}`);
    }
  }
  return anomalies;
}

/** Log tail, config inspection and history anomalies for a branch's run. */
export async function diagnose(opts: CommonOptions & { branch: string; lines?: number }): Promise<DiagnoseResult> {
  try {
    const ctx = loadContext(opts);
    const state = await ctx.store.load(ctx.config.project);
    const resolved = await resolveRun(ctx, state, opts.branch, { history: true });
    if (!resolved) return fail("NO_RUNS", `No runs found for branch ${opts.branch}`, EXIT.NO_RUNS);

    const { run } = resolved;
    const logTail = await ctx.registry.getLogTail(run.id, opts.lines ?? 50);
    const tracked = state.branches[opts.branch];
    return {
      ok: true,
      branch: opts.branch,
      run_id: run.id,
      run_state: run.state,
      failed: run.state === "failed" || run.state === "crashed",
      log_tail: logTail,
      log_errors: logErrors(logTail),
      config: run.config,
      config_check: checkHyperparameters(run.config, ctx.config.hyperparameters.unknown_keys),
      anomalies: historyAnomalies(resolved.history ?? [], ctx.config.metrics.directions),
      retries_left: tracked ? Math.max(0, ctx.config.lifecycle.max_retries - tracked.retry_count) : null,
    };
  } catch (e) {
    return failure(e);
  }
}
