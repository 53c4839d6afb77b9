import type { ComparisonResult, MetricDelta } from "../types/comparison.js";
import type { RunState } from "../types/run.js";
import type { DirectionOverrides } from "../compare/direction.js";
import { matchesMetric } from "../compare/direction.js";
import { selectMetrics } from "../compare/comparator.js";
import { computeWinCounts, type Contender } from "../compare/win-count.js";

export type RenderedVerdict = "winner" | "loser" | "inconclusive";

export type VerdictOutcome =
  | { route: "fix"; reason: string }
  | { route: "verdict"; verdict: RenderedVerdict; earlyDiscard: boolean; reason: string };

export type VerdictInput = {
  runState: RunState;
  comparison: ComparisonResult | null;
  /** Primary metrics (names or patterns); empty means every compared metric. */
  primary?: string[];
};

export function primaryDeltas(comparison: ComparisonResult, primary: string[] = []): MetricDelta[] {
  if (primary.length === 0) return comparison.deltas;
  return comparison.deltas.filter((d) => primary.some((entry) => matchesMetric(d.metric, entry)));
}

/**
 * Per-branch verdict against the fixed baseline.
 *
 * - failed/crashed: no verdict, the branch goes down the fix/retry path
 * - queued/running: inconclusive
 * - cancelled: loser
 * - finished: loser at once when worse-or-equal on every primary metric
 *   (early discard); otherwise inconclusive until the batch is ranked
 */
export function renderVerdict(input: VerdictInput): VerdictOutcome {
  switch (input.runState) {
    case "failed":
    case "crashed":
      return { route: "fix", reason: `run ${input.runState}` };
    case "queued":
    case "running":
      return { route: "verdict", verdict: "inconclusive", earlyDiscard: false, reason: `run ${input.runState}` };
    case "cancelled":
      return { route: "verdict", verdict: "loser", earlyDiscard: false, reason: "run cancelled" };
    case "finished":
      break;
  }

  const deltas = input.comparison ? primaryDeltas(input.comparison, input.primary) : [];
  if (deltas.length === 0) {
    return {
      route: "verdict",
      verdict: "inconclusive",
      earlyDiscard: false,
      reason: "ambiguous: no primary metric comparable with the baseline",
    };
  }

  if (deltas.every((d) => !d.improved)) {
    const metrics = deltas.map((d) => d.metric).join(", ");
    return {
      route: "verdict",
      verdict: "loser",
      earlyDiscard: true,
      reason: `early discard: no improvement on ${metrics}`,
    };
  }

  const improved = deltas.filter((d) => d.improved).map((d) => d.metric);
  return {
    route: "verdict",
    verdict: "inconclusive",
    earlyDiscard: false,
    reason: `improved on ${improved.join(", ")}; awaiting batch ranking`,
  };
}

export type BatchRanking = {
  metrics: string[];
  winCounts: Record<string, number>;
  topCount: number;
  winners: string[];
  losers: string[];
};

export function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Rank the surviving branches of a batch by win count over the primary metrics.
 * Every branch tied at the top count is a winner candidate; ties are never broken
 * here, the quality gate decides.
 */
export function rankBatch(
  survivors: Contender[],
  opts: { primary?: string[]; directions?: DirectionOverrides } = {},
): BatchRanking {
  const metricSet = new Set<string>();
  for (const s of survivors) {
    for (const m of selectMetrics(s.metrics, opts.primary).metrics) metricSet.add(m);
  }
  const metrics = [...metricSet].sort(byName);

  const counts = computeWinCounts(survivors, metrics, opts.directions);
  const winCounts = Object.fromEntries([...counts.entries()].sort(([a], [b]) => byName(a, b)));
  const topCount = survivors.length === 0 ? 0 : Math.max(...counts.values());

  const names = survivors.map((s) => s.name).sort(byName);
  return {
    metrics,
    winCounts,
    topCount,
    winners: names.filter((n) => counts.get(n) === topCount),
    losers: names.filter((n) => counts.get(n) !== topCount),
  };
}
