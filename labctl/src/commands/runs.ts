import type { LabState } from "../types/state.js";
import type { HistoryStep, Run } from "../types/run.js";
import type { LabContext } from "./context.js";

export type ResolvedRun = {
  run: Run;
  history: HistoryStep[] | null;
  /** Whether the run is the tracked branch's active run rather than the tracker's latest. */
  tracked: boolean;
};

/** The run that stands for `branch`: its active run when tracked, else the tracker's latest. */
export async function resolveRun(
  ctx: LabContext,
  state: LabState,
  branch: string,
  opts: { history?: boolean } = {},
): Promise<ResolvedRun | null> {
  const runId = state.branches[branch]?.run_id;
  if (runId) {
    const run = await ctx.registry.getRun(runId);
    if (run) {
      const history = opts.history ? await ctx.registry.getHistory(run.id) : null;
      return { run, history, tracked: true };
    }
  }
  const latest = await ctx.registry.latestForBranch(branch, opts);
  return latest ? { ...latest, tracked: false } : null;
}
