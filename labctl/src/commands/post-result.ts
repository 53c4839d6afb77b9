import type { Verdict } from "../types/branch.js";
import type { ComparisonResult } from "../types/comparison.js";
import type { Run } from "../types/run.js";
import { compareMetrics } from "../compare/comparator.js";
import { LABELS } from "../hosting/review-host.js";
import { createLogger } from "../logging/logger.js";
import { EXIT } from "./exit-codes.js";
import { branchTracker, loadContext, type CommonOptions } from "./context.js";
import { fail, failure, type CommandResult } from "./result.js";

const log = createLogger("post-result");

export type PostResultResult = CommandResult<{
  branch: string;
  review_request: string;
  created: boolean;
  labels: string[];
}>;

function labelsFor(verdict: Verdict): string[] {
  if (verdict === "winner") return [LABELS.winner];
  if (verdict === "loser") return [LABELS.loser];
  return [];
}

/** Markdown comment summarizing a branch's run against the baseline. */
export function resultComment(
  branch: string,
  verdict: Verdict,
  run: Run | null,
  baselineId: string | null,
  comparison: ComparisonResult,
): string {
  const lines = [`### labctl result: ${branch}`, "", `Verdict: **${verdict}**`];
  if (run) lines.push(`Run: ${run.name} (${run.id}, ${run.state})`);
  if (!baselineId) {
    lines.push("", "No baseline to compare against.");
    return lines.join("\n") + "\n";
  }
  lines.push(`Baseline: ${baselineId}`, "");
  if (comparison.deltas.length > 0) {
    lines.push("| Metric | Candidate | Baseline | Delta |", "|---|---|---|---|");
    for (const d of comparison.deltas) {
      const mark = d.improved ? " (better)" : d.sign === -1 ? " (worse)" : "";
      lines.push(`| ${d.metric} | ${d.candidate} | ${d.baseline} | ${d.delta}${mark} |`);
    }
  }
  for (const ex of comparison.excluded) lines.push(`- ${ex.metric}: ${ex.reason.replaceAll("_", " ")}`);
  return lines.join("\n") + "\n";
}

/**
 * Comment a branch's result on its review request, or open one with `create`.
 * The verdict label (winner/loser) is added alongside.
 */
export async function postResult(
  opts: CommonOptions & { branch: string; create?: boolean },
): Promise<PostResultResult> {
  try {
    const ctx = loadContext(opts);
    const host = ctx.deps.host;
    if (!host) {
      return fail("INVALID_ARGS", "No code host configured (hosting.provider is none)", EXIT.INVALID_ARGS);
    }

    return await ctx.store.update(ctx.config.project, async (state) => {
      const tracker = branchTracker(ctx, state);
      const branch = tracker.get(opts.branch);
      const run = branch.run_id ? await ctx.registry.getRun(branch.run_id) : null;
      const baseline = state.baselines.find((b) => b.id === state.active_baseline_id) ?? null;
      const { primary, directions } = ctx.config.metrics;
      const comparison =
        run && baseline
          ? compareMetrics(run.summary, baseline.metrics, { metrics: primary.length > 0 ? primary : undefined, directions })
          : { deltas: [], excluded: [] };
      const body = resultComment(branch.name, branch.verdict, run, baseline?.id ?? null, comparison);

      let id = branch.review_request;
      let created = false;
      if (id) {
        await host.comment(id, body);
      } else if (opts.create) {
        id = await host.createReviewRequest({
          branch: branch.name,
          base: ctx.config.trunk.branch,
          title: `labctl: ${branch.name}`,
          body,
        });
        tracker.setReviewRequest(branch.name, id);
        created = true;
      } else {
        return fail("INVALID_ARGS", `${branch.name} has no review request; pass --create to open one`, EXIT.INVALID_ARGS);
      }

      const labels = labelsFor(branch.verdict);
      if (labels.length > 0) await host.addLabels(id, labels);
      log.info({ branch: branch.name, review: id, created }, "result posted");
      return { ok: true as const, branch: branch.name, review_request: id, created, labels };
    });
  } catch (e) {
    return failure(e);
  }
}
