import type { Scalar } from "./run.js";

/** Baseline snapshot: the run on trunk that candidates are compared against. */
export type Baseline = {
  id: string;
  run_id: string;
  commit: string;
  metrics: Record<string, number>;
  config: Record<string, Scalar>;
  established_at: string;
  previous_id: string | null;
  source_batch_id: string | null;
  merged_branches: string[];
  merge_commits: string[];
};

/** Trunk state left by a merged batch, waiting for its fresh baseline run. */
export type PendingBaseline = {
  batch_id: string;
  commit: string;
  merged_branches: string[];
  merge_commits: string[];
  created_at: string;
};
