import type { Baseline } from "../types/baseline.js";
import type { RegressionReport } from "../types/regression.js";
import { compareMetrics, type CompareOptions } from "../compare/comparator.js";

/**
 * Compare a new baseline with the one it replaced. Returns a report when any
 * primary metric got worse, or null.
 */
export function detectRegression(
  current: Baseline,
  previous: Baseline,
  opts: CompareOptions,
  detectedAt: string,
): RegressionReport | null {
  const { deltas } = compareMetrics(current.metrics, previous.metrics, opts);
  const regressed = deltas.filter((d) => d.sign === -1);
  if (regressed.length === 0) return null;

  return {
    baseline_id: current.id,
    previous_baseline_id: previous.id,
    merged_branches: [...current.merged_branches],
    merge_commits: [...current.merge_commits],
    regressed,
    deltas,
    recommended_action: "rollback",
    detected_at: detectedAt,
  };
}
