import type { MetricDelta } from "./comparison.js";

export type RegressionReport = {
  baseline_id: string;
  previous_baseline_id: string;
  merged_branches: string[];
  merge_commits: string[];
  regressed: MetricDelta[];
  deltas: MetricDelta[];
  recommended_action: "rollback";
  detected_at: string;
};

export type RollbackRecord = {
  id: string;
  from_baseline_id: string;
  to_baseline_id: string;
  reverted_commits: string[];
  revert_commits: string[];
  /** Commits that reverted `revert_commits` when the rollback was undone. */
  undo_commits: string[];
  trunk_head: string;
  report: RegressionReport | null;
  undone: boolean;
  at: string;
};
