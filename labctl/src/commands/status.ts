import type { LifecycleState, Verdict } from "../types/branch.js";
import type { Run, RunState } from "../types/run.js";
import { byName } from "../verdict/verdict-engine.js";
import { EXIT } from "./exit-codes.js";
import { loadContext, type CommonOptions } from "./context.js";
import { fail, failure, type CommandResult } from "./result.js";

export type StatusRow = {
  branch: string;
  /** null for runs of branches labctl does not track. */
  lifecycle: LifecycleState | null;
  verdict: Verdict | null;
  batch: string | null;
  run_id: string | null;
  run_state: RunState | null;
  win_count: number | null;
  retry_count: number;
  hold: string | null;
};

export type StatusResult = CommandResult<{ rows: StatusRow[]; active_baseline: string | null }>;

/** Latest run per branch name, for runs whose branch is known. */
export function latestByBranch(runs: Run[]): Map<string, Run> {
  const latest = new Map<string, Run>();
  for (const run of runs) {
    if (!run.branch) continue;
    const current = latest.get(run.branch);
    if (!current || run.created_at > current.created_at) latest.set(run.branch, run);
  }
  return latest;
}

/**
 * Tracked branches with lifecycle state, run state and verdict, plus the latest
 * run of every untracked branch the tracker knows.
 */
export async function status(opts: CommonOptions & { branch?: string } = {}): Promise<StatusResult> {
  try {
    const ctx = loadContext(opts);
    const state = await ctx.store.load(ctx.config.project);
    const rows: StatusRow[] = [];

    for (const branch of Object.values(state.branches)) {
      if (opts.branch ? branch.name !== opts.branch : branch.state === "archived") continue;
      const run = branch.run_id ? await ctx.registry.getRun(branch.run_id) : null;
      rows.push({
        branch: branch.name,
        lifecycle: branch.state,
        verdict: branch.verdict,
        batch: branch.batch_id,
        run_id: branch.run_id,
        run_state: run?.state ?? null,
        win_count: branch.win_count,
        retry_count: branch.retry_count,
        hold: branch.hold,
      });
    }

    const runs = await ctx.registry.listRuns(opts.branch ? { branch: opts.branch } : {});
    for (const [name, run] of latestByBranch(runs)) {
      if (state.branches[name]) continue;
      rows.push({
        branch: name,
        lifecycle: null,
        verdict: null,
        batch: null,
        run_id: run.id,
        run_state: run.state,
        win_count: null,
        retry_count: 0,
        hold: null,
      });
    }

    if (rows.length === 0) {
      const scope = opts.branch ? ` for branch ${opts.branch}` : "";
      return fail("NO_RUNS", `No runs found${scope}`, EXIT.NO_RUNS);
    }
    rows.sort((a, b) => byName(a.branch, b.branch));
    return { ok: true, rows, active_baseline: state.active_baseline_id };
  } catch (e) {
    return failure(e);
  }
}
