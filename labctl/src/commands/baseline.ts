import type { Baseline, PendingBaseline } from "../types/baseline.js";
import type { RegressionReport } from "../types/regression.js";
import { RegressionDetected } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { loadContext, reconciler, type CommonOptions } from "./context.js";
import { failure, type CommandResult } from "./result.js";

const log = createLogger("baseline");

export type BaselineShowResult = CommandResult<{
  active: Baseline | null;
  baselines: Baseline[];
  pending: PendingBaseline | null;
  regressions: RegressionReport[];
}>;

/** Baseline history, the active one, and the merged trunk waiting for its baseline run. */
export async function showBaselines(opts: CommonOptions = {}): Promise<BaselineShowResult> {
  try {
    const ctx = loadContext(opts);
    const state = await ctx.store.load(ctx.config.project);
    return {
      ok: true,
      active: state.baselines.find((b) => b.id === state.active_baseline_id) ?? null,
      baselines: state.baselines,
      pending: state.pending_baseline,
      regressions: state.regressions,
    };
  } catch (e) {
    return failure(e);
  }
}

export type EstablishOptions = CommonOptions & {
  runId: string;
  /** Trunk commit, for runs that record none. */
  commit?: string;
  /** Also publish a release on the code host. */
  release?: boolean;
};

export type EstablishCommandResult = CommandResult<{ baseline: Baseline; release: string | null }>;

export function releaseNotes(baseline: Baseline): string {
  const lines = [`Baseline ${baseline.id} from run ${baseline.run_id} at ${baseline.commit}.`, ""];
  if (baseline.merged_branches.length > 0) lines.push(`Merged: ${baseline.merged_branches.join(", ")}`, "");
  for (const [metric, value] of Object.entries(baseline.metrics).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    lines.push(`- ${metric}: ${value}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * Make a finished run the active baseline. A regression against the previous
 * baseline is kept in state and reported as RegressionDetected; the baseline stays
 * established and no release is cut.
 */
export async function establish(opts: EstablishOptions): Promise<EstablishCommandResult> {
  try {
    const ctx = loadContext(opts);
    const { baseline, regression } = await ctx.store.update(ctx.config.project, (state) =>
      reconciler(ctx, state).establishBaseline(opts.runId, opts.commit),
    );
    if (regression) throw new RegressionDetected(regression, { operation: "establish_baseline" });

    let release: string | null = null;
    if (opts.release && ctx.deps.host) {
      release = `labctl-${baseline.id}`;
      await ctx.deps.host.createRelease(release, `Baseline ${baseline.id}`, releaseNotes(baseline));
      log.info({ baseline: baseline.id, tag: release }, "release created");
    }
    return { ok: true, baseline, release };
  } catch (e) {
    return failure(e);
  }
}
